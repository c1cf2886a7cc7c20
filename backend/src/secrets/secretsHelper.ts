/** Secret retrieval helper with lazy caching, retry logic, and telemetry */

import { DefaultAzureCredential } from '@azure/identity'
import { SecretClient } from '@azure/keyvault-secrets'
import { setTimeout as sleep } from 'node:timers/promises'
import type { TelemetryService } from '../telemetry/TelemetryService.js'

/** Allowlisted secret keys that can be retrieved */
export const ALLOWED_SECRET_KEYS = ['copilot-mcp-token'] as const

export type AllowedSecretKey = (typeof ALLOWED_SECRET_KEYS)[number]

/** Environment variables consulted, in order, when Key Vault is not configured or has no value. */
export const LOCAL_FALLBACK_ENV_VARS: Record<AllowedSecretKey, readonly string[]> = {
    'copilot-mcp-token': ['COPILOT_MCP_TOKEN', 'GITHUB_COPILOT_MCP_TOKEN', 'CopilotMcp__Token']
}

export class SecretNotFoundError extends Error {
    constructor(public readonly secretKey: AllowedSecretKey) {
        super(`Secret ${secretKey} not found. Configure KEYVAULT_NAME or set ${LOCAL_FALLBACK_ENV_VARS[secretKey][0]}.`)
        this.name = 'SecretNotFoundError'
    }
}

interface CachedSecret {
    value: string
    fetchedAt: number
}

export interface SecretFetchOptions {
    /** Maximum retry attempts (default: 3) */
    maxRetries?: number
    /** Initial retry delay in ms (default: 1000) */
    initialRetryDelayMs?: number
    /** Cache TTL in ms (default: 5 minutes) */
    cacheTtlMs?: number
    telemetryService?: TelemetryService
    /** Aborts the Key Vault request and any retry wait */
    signal?: AbortSignal
}

type TunableFetchOptions = Required<Omit<SecretFetchOptions, 'telemetryService' | 'signal'>>

type ResolvedFetchOptions = TunableFetchOptions & Pick<SecretFetchOptions, 'telemetryService' | 'signal'>

const DEFAULT_OPTIONS: TunableFetchOptions = {
    maxRetries: 3,
    initialRetryDelayMs: 1000,
    cacheTtlMs: 5 * 60 * 1000
}

const secretCache = new Map<string, CachedSecret>()

/** Lazy-initialized Secret Client */
let secretClient: SecretClient | null = null

/**
 * Get or create the Secret Client using Managed Identity (DefaultAzureCredential).
 * Returns null when KEYVAULT_NAME is not set.
 */
function getSecretClient(): SecretClient | null {
    const keyVaultName = process.env.KEYVAULT_NAME
    if (!keyVaultName) {
        return null
    }

    if (!secretClient) {
        const vaultUrl = `https://${keyVaultName}.vault.azure.net`
        secretClient = new SecretClient(vaultUrl, new DefaultAzureCredential())
    }

    return secretClient
}

function validateSecretKey(key: string): asserts key is AllowedSecretKey {
    if (!(ALLOWED_SECRET_KEYS as readonly string[]).includes(key)) {
        throw new Error(`Secret key "${key}" is not in allowlist. Allowed keys: ${ALLOWED_SECRET_KEYS.join(', ')}`)
    }
}

function getLocalFallback(secretKey: AllowedSecretKey): string | undefined {
    for (const envVarName of LOCAL_FALLBACK_ENV_VARS[secretKey]) {
        const value = process.env[envVarName]?.trim()
        if (value) return value
    }
    return undefined
}

async function fetchSecretWithRetry(client: SecretClient, secretKey: AllowedSecretKey, options: ResolvedFetchOptions): Promise<string> {
    let lastError: Error | null = null

    for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
        try {
            const secret = await client.getSecret(secretKey, { abortSignal: options.signal })
            if (!secret.value) {
                throw new Error(`Secret ${secretKey} exists but has no value`)
            }
            return secret.value
        } catch (err) {
            options.signal?.throwIfAborted()
            lastError = err instanceof Error ? err : new Error(String(err))

            // Don't retry on the last attempt
            if (attempt < options.maxRetries) {
                const delayMs = options.initialRetryDelayMs * Math.pow(2, attempt)
                options.telemetryService?.trackEventStrict('Secret.Fetch.Retry', {
                    secretKey,
                    attempt,
                    delayMs,
                    error: lastError.message
                })
                await sleep(delayMs, undefined, { signal: options.signal })
            }
        }
    }

    throw new Error(`Failed to fetch secret ${secretKey} after ${options.maxRetries + 1} attempts: ${lastError?.message || 'unknown error'}`)
}

/**
 * Get a secret value with caching, retry, and telemetry.
 *
 * Key Vault (KEYVAULT_NAME) is tried first; environment variables are the fallback
 * and are never cached, so app setting changes apply on the next call.
 *
 * @throws SecretNotFoundError when neither source has a value
 */
export async function getSecret(secretKey: string, options: SecretFetchOptions = {}): Promise<string> {
    validateSecretKey(secretKey)

    const opts: ResolvedFetchOptions = { ...DEFAULT_OPTIONS, ...options }
    const telemetry = opts.telemetryService
    opts.signal?.throwIfAborted()
    const now = Date.now()

    const cached = secretCache.get(secretKey)
    if (cached && now - cached.fetchedAt < opts.cacheTtlMs) {
        telemetry?.trackEventStrict('Secret.Cache.Hit', { secretKey })
        return cached.value
    }
    telemetry?.trackEventStrict('Secret.Cache.Miss', { secretKey })

    const client = getSecretClient()
    if (client) {
        try {
            const value = await fetchSecretWithRetry(client, secretKey, opts)
            secretCache.set(secretKey, { value, fetchedAt: now })
            telemetry?.trackEventStrict('Secret.Fetch.Success', { secretKey, source: 'keyvault' })
            return value
        } catch (err) {
            opts.signal?.throwIfAborted()
            telemetry?.trackEventStrict('Secret.Fetch.Failure', {
                secretKey,
                source: 'keyvault',
                error: err instanceof Error ? err.message : String(err)
            })
            const fallback = getLocalFallback(secretKey)
            if (fallback) {
                telemetry?.trackEventStrict('Secret.Fetch.Success', { secretKey, source: 'env' })
                return fallback
            }
            throw err
        }
    }

    const localValue = getLocalFallback(secretKey)
    if (localValue) {
        telemetry?.trackEventStrict('Secret.Fetch.Success', { secretKey, source: 'local-env' })
        return localValue
    }

    telemetry?.trackEventStrict('Secret.Fetch.Failure', {
        secretKey,
        source: 'none',
        error: 'No Key Vault configured and no environment variable set'
    })
    throw new SecretNotFoundError(secretKey)
}

/**
 * Clear the secret cache (useful for testing or forcing refresh)
 */
export function clearSecretCache(telemetryService?: TelemetryService): void {
    secretCache.clear()
    telemetryService?.trackEventStrict('Secret.Cache.Clear', {})
}

export function getSecretCacheStats(): { size: number; keys: string[] } {
    return {
        size: secretCache.size,
        keys: Array.from(secretCache.keys())
    }
}
