import type { ToolFailurePayload, ToolOutputPayload } from '@foundry-mcp-chat/shared'
import assert from 'node:assert'
import { describe, test } from 'node:test'
import { StreamableHTTPError } from '@modelcontextprotocol/sdk/client/streamableHttp.js'
import { McpGatewayError } from '../../src/mcp/mcpGatewayClient.js'
import { GITHUB_TOOL_DEFINITIONS } from '../../src/mcp/githubTools.js'
import { ToolCatalog } from '../../src/mcp/toolCatalog.js'
import { extractToolResult, MISSING_CREDENTIAL_ERROR, MISSING_CREDENTIAL_HOW_TO_FIX, ToolInvoker } from '../../src/mcp/toolInvoker.js'
import { TelemetryService } from '../../src/telemetry/TelemetryService.js'
import { TestMocks } from '../helpers/TestFixture.js'
import { FakeCredentialProvider } from '../mocks/FakeCredentialProvider.js'
import { FakeMcpGatewayClient, textResult } from '../mocks/FakeMcpGatewayClient.js'
import { MockTelemetryClient } from '../mocks/MockTelemetryClient.js'

function setup(token: string | undefined = 'test-secret') {
    const gateway = new FakeMcpGatewayClient()
    const credentials = new FakeCredentialProvider(token)
    const telemetry = new MockTelemetryClient()
    const invoker = new ToolInvoker(
        new ToolCatalog(GITHUB_TOOL_DEFINITIONS),
        gateway,
        credentials,
        { endpoint: 'https://mcp.test.local/mcp/', callTimeoutMs: 5000 },
        new TelemetryService(telemetry)
    )
    const logs = TestMocks.createInvocationContext()
    return { gateway, credentials, telemetry, invoker, logs, ctx: { logger: logs.context, correlationId: 'corr-1' } }
}

function assertFailure(payload: ToolOutputPayload): ToolFailurePayload {
    assert.strictEqual(payload.success, false)
    if (payload.success) throw new Error('expected a failure payload')
    return payload
}

describe('ToolInvoker', () => {
    test('returns JSON-parsed text content on success', async () => {
        const { gateway, invoker, ctx } = setup()
        gateway.respondWith('list_issues', async () => textResult('[{"number":1,"title":"Bug"}]'))

        const payload = await invoker.invoke('list_issues', { owner: 'octo', repo: 'demo' }, ctx)

        assert.deepStrictEqual(payload, { success: true, function: 'list_issues', result: [{ number: 1, title: 'Bug' }] })
        assert.deepStrictEqual(gateway.requests[0], {
            name: 'list_issues',
            arguments: { owner: 'octo', repo: 'demo' },
            token: 'test-secret',
            signal: undefined,
            timeoutMs: 5000
        })
    })

    test('logs one line and tracks one event per call', async () => {
        const { invoker, ctx, logs, telemetry } = setup()

        await invoker.invoke('list_issues', { owner: 'octo', repo: 'demo' }, ctx)

        assert.deepStrictEqual(logs.messages('information'), ['MCP tools/call list_issues => 200'])
        const events = telemetry.eventsNamed('Mcp.Tool.Invoked')
        assert.strictEqual(events.length, 1)
        assert.strictEqual(events[0]?.properties?.toolName, 'list_issues')
        assert.strictEqual(events[0]?.properties?.status, 200)
        assert.strictEqual(events[0]?.properties?.outcome, 'success')
        assert.strictEqual(events[0]?.properties?.correlationId, 'corr-1')
    })

    test('never logs the credential or the arguments', async () => {
        const { invoker, ctx, logs } = setup()
        await invoker.invoke('get_file_contents', { owner: 'octo', repo: 'demo', path: 'private.txt' }, ctx)
        for (const log of logs.logs) {
            assert.ok(!log.message.includes('test-secret'))
            assert.ok(!log.message.includes('private.txt'))
        }
    })

    test('unknown tools fail with 404 and list the available tools without dispatching', async () => {
        const { gateway, invoker, ctx, logs } = setup()

        const failure = assertFailure(await invoker.invoke('delete_repository', {}, ctx))

        assert.strictEqual(failure.error, "Unknown tool 'delete_repository'")
        assert.strictEqual(
            failure.howToFix,
            'Use one of the available tools: search_repositories, get_file_contents, create_or_update_file, list_issues, create_issue, create_pull_request.'
        )
        assert.strictEqual(gateway.requests.length, 0)
        assert.deepStrictEqual(logs.messages('information'), ['MCP tools/call delete_repository => 404'])
    })

    test('a missing credential yields the stable COPILOT_MCP_TOKEN guidance', async () => {
        const { gateway, invoker, ctx } = setup(undefined)

        const failure = assertFailure(await invoker.invoke('list_issues', { owner: 'octo', repo: 'demo' }, ctx))

        assert.strictEqual(failure.error, MISSING_CREDENTIAL_ERROR)
        assert.ok(failure.error.includes('Missing'))
        assert.ok(failure.error.includes('COPILOT_MCP_TOKEN'))
        assert.strictEqual(failure.howToFix, MISSING_CREDENTIAL_HOW_TO_FIX)
        assert.strictEqual(gateway.requests.length, 0)
    })

    test('a credential lookup failure is folded into the payload', async () => {
        const { invoker, ctx, credentials, logs } = setup()
        credentials.failure = new Error('vault unreachable')

        const failure = assertFailure(await invoker.invoke('list_issues', {}, ctx))

        assert.strictEqual(failure.error, 'Failed to resolve MCP gateway credential: vault unreachable')
        assert.deepStrictEqual(logs.messages('information'), ['MCP tools/call list_issues => 401'])
    })

    test('non-object arguments fail with 400', async () => {
        const { gateway, invoker, ctx } = setup()
        const failure = assertFailure(await invoker.invoke('list_issues', [1, 2], ctx))
        assert.strictEqual(failure.error, "Arguments for tool 'list_issues' must be a JSON object")
        assert.strictEqual(gateway.requests.length, 0)
    })

    test('tool-level errors carry the tool text', async () => {
        const { gateway, invoker, ctx, telemetry } = setup()
        gateway.respondWith('create_issue', async () => textResult('Resource not accessible by integration', true))

        const failure = assertFailure(await invoker.invoke('create_issue', { owner: 'octo', repo: 'demo', title: 'x' }, ctx))

        assert.deepStrictEqual(failure, { success: false, function: 'create_issue', error: 'Resource not accessible by integration' })
        assert.strictEqual(telemetry.eventsNamed('Mcp.Tool.Invoked')[0]?.properties?.outcome, 'tool-error')
    })

    test('gateway HTTP errors name the status', async () => {
        const { gateway, invoker, ctx, logs } = setup()
        gateway.respondWith('list_issues', async () => {
            throw new McpGatewayError('Bad credentials', 401, 'http')
        })

        const failure = assertFailure(await invoker.invoke('list_issues', {}, ctx))

        assert.strictEqual(failure.error, 'MCP gateway returned HTTP 401: Bad credentials')
        assert.strictEqual(failure.howToFix, 'Check that COPILOT_MCP_TOKEN is a valid GitHub token with Copilot MCP access.')
        assert.deepStrictEqual(logs.messages('information'), ['MCP tools/call list_issues => 401'])
    })

    test('SDK HTTP errors are classified', async () => {
        const { gateway, invoker, ctx, logs } = setup()
        gateway.respondWith('list_issues', async () => {
            throw new StreamableHTTPError(500, 'boom')
        })

        const failure = assertFailure(await invoker.invoke('list_issues', {}, ctx))

        assert.ok(failure.error.startsWith('MCP gateway returned HTTP 500: '))
        assert.strictEqual(failure.howToFix, undefined)
        assert.deepStrictEqual(logs.messages('information'), ['MCP tools/call list_issues => 500'])
    })

    test('timeouts fail with 504', async () => {
        const { gateway, invoker, ctx, logs } = setup()
        gateway.respondWith('list_issues', async () => {
            throw new McpGatewayError('Request timed out', 504, 'timeout')
        })

        const failure = assertFailure(await invoker.invoke('list_issues', {}, ctx))

        assert.strictEqual(failure.error, 'MCP gateway call timed out after 5000 ms')
        assert.deepStrictEqual(logs.messages('information'), ['MCP tools/call list_issues => 504'])
    })

    test('transport failures fail with 502', async () => {
        const { gateway, invoker, ctx, logs } = setup()
        gateway.respondWith('list_issues', async () => {
            throw new TypeError('fetch failed')
        })

        const failure = assertFailure(await invoker.invoke('list_issues', {}, ctx))

        assert.strictEqual(failure.error, 'MCP gateway request failed: fetch failed')
        assert.deepStrictEqual(logs.messages('information'), ['MCP tools/call list_issues => 502'])
    })

    test('the credential lookup receives the caller signal', async () => {
        const { credentials, invoker, logs } = setup()
        const controller = new AbortController()

        await invoker.invoke('list_issues', {}, { logger: logs.context, signal: controller.signal })

        assert.deepStrictEqual(credentials.signals, [controller.signal])
    })

    test('an abort during a slow credential lookup stops before the gateway call', async () => {
        const { gateway, credentials, telemetry, invoker, logs } = setup()
        credentials.lookupDelayMs = 50
        const controller = new AbortController()
        setTimeout(() => controller.abort(), 5)

        await assert.rejects(() => invoker.invoke('list_issues', {}, { logger: logs.context, signal: controller.signal }), { name: 'AbortError' })

        assert.strictEqual(gateway.requests.length, 0)
        assert.strictEqual(telemetry.eventsNamed('Mcp.Tool.Invoked').length, 0)
    })

    test('an already aborted signal skips the credential lookup', async () => {
        const { gateway, credentials, invoker, logs } = setup()
        const controller = new AbortController()
        controller.abort()

        await assert.rejects(() => invoker.invoke('list_issues', {}, { logger: logs.context, signal: controller.signal }), { name: 'AbortError' })

        assert.strictEqual(credentials.lookups, 0)
        assert.strictEqual(gateway.requests.length, 0)
    })

    test('rethrows when the caller signal aborted', async () => {
        const { gateway, invoker, logs } = setup()
        const controller = new AbortController()
        gateway.respondWith('list_issues', async () => {
            controller.abort()
            throw new Error('aborted by caller')
        })

        await assert.rejects(() => invoker.invoke('list_issues', {}, { logger: logs.context, signal: controller.signal }), /aborted by caller/)
    })
})

describe('extractToolResult', () => {
    test('prefers structured content', () => {
        assert.deepStrictEqual(extractToolResult({ status: 200, content: [{ type: 'text', text: 'ignored' }], structuredContent: { a: 1 }, isError: false }), {
            a: 1
        })
    })

    test('joins text items with newlines and keeps non-JSON text', () => {
        assert.strictEqual(
            extractToolResult({
                status: 200,
                content: [
                    { type: 'text', text: 'line one' },
                    { type: 'image' },
                    { type: 'text', text: 'line two' }
                ],
                isError: false
            }),
            'line one\nline two'
        )
    })
})
