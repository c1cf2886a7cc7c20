import { inject, injectable } from 'inversify'
import { TelemetryService } from '../telemetry/TelemetryService.js'
import { getSecret, LOCAL_FALLBACK_ENV_VARS, SecretNotFoundError } from './secretsHelper.js'

export const GATEWAY_TOKEN_SECRET_KEY = 'copilot-mcp-token'

/** Resolves the bearer token sent to the MCP gateway. */
export interface IGatewayCredentialProvider {
    /**
     * @returns the token, or undefined when none is configured
     * @throws when Key Vault is configured but unreachable and no environment fallback exists,
     *   or with the signal's reason once it aborts
     */
    getToken(signal?: AbortSignal): Promise<string | undefined>
    /** Whether a credential source is configured, without fetching it. */
    isConfigured(): boolean
}

@injectable()
export class GatewayCredentialProvider implements IGatewayCredentialProvider {
    constructor(@inject(TelemetryService) private readonly telemetry: TelemetryService) {}

    async getToken(signal?: AbortSignal): Promise<string | undefined> {
        try {
            return await getSecret(GATEWAY_TOKEN_SECRET_KEY, { telemetryService: this.telemetry, signal })
        } catch (error) {
            if (error instanceof SecretNotFoundError) {
                return undefined
            }
            throw error
        }
    }

    isConfigured(): boolean {
        if (process.env.KEYVAULT_NAME) return true
        return LOCAL_FALLBACK_ENV_VARS[GATEWAY_TOKEN_SECRET_KEY].some((name) => Boolean(process.env[name]?.trim()))
    }
}
