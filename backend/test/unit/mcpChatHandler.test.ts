import assert from 'node:assert'
import { describe, test } from 'node:test'
import { NullConversationRuntime, type IConversationRuntime } from '../../src/agents/conversationRuntime.js'
import { NO_TOOLS_CONFIGURED_MESSAGE } from '../../src/agents/runOrchestrator.js'
import { TOKENS } from '../../src/di/tokens.js'
import { mcpChatHandler } from '../../src/handlers/mcpChat.js'
import { TestMocks } from '../helpers/TestFixture.js'
import { createTestContainer, type TestContainerOptions } from '../helpers/testInversify.config.js'
import { assistantMessage } from '../mocks/FakeConversationRuntime.js'

function setup(options: TestContainerOptions = {}) {
    const fixture = createTestContainer(options)
    fixture.runtime.messages = [assistantMessage('m1', 10, 'octo/demo has 3 open issues.', [{ url: 'https://github.com/octo/demo/issues' }])]
    const invocation = TestMocks.createInvocationContext(fixture.container)
    const post = (body: unknown) =>
        mcpChatHandler(
            TestMocks.createHttpRequest({
                method: 'POST',
                url: 'http://localhost/api/chat/mcp',
                headers: { 'x-correlation-id': 'corr-1' },
                body
            }),
            invocation.context
        )
    return { ...fixture, ...invocation, post }
}

describe('McpChat handler', () => {
    test('returns the assistant reply in the ok envelope', async () => {
        const { post, telemetry } = setup()

        const response = await post({ message: 'How many open issues does octo/demo have?' })

        assert.strictEqual(response.status, 200)
        assert.deepStrictEqual(response.jsonBody, {
            success: true,
            data: {
                response: 'octo/demo has 3 open issues.',
                citations: [{ title: 'https://github.com/octo/demo/issues', url: 'https://github.com/octo/demo/issues' }],
                outcome: 'completed',
                threadId: 'thread-new',
                agentId: 'agent-1',
                runId: 'run-1',
                toolCallCount: 0
            },
            correlationId: 'corr-1'
        })
        const [requested] = telemetry.eventsNamed('Chat.Turn.Requested')
        assert.strictEqual(requested?.properties?.correlationId, 'corr-1')
        assert.strictEqual(requested?.properties?.hasThread, false)
        assert.strictEqual(requested?.properties?.autoApprove, true)
        assert.strictEqual(requested?.properties?.requireTools, false)
    })

    test('passes the thread handle and approval flag through', async () => {
        const { post, runtime } = setup()

        const response = await post({ message: 'And closed ones?', threadId: 'thread-existing', autoApproveMcpTools: false })

        assert.strictEqual(response.status, 200)
        assert.strictEqual(runtime.callCount('createThread'), 0)
        assert.deepStrictEqual(runtime.calls.find((call) => call.method === 'addUserMessage')?.args, ['thread-existing', 'And closed ones?'])
    })

    test('rejects a body that is not JSON', async () => {
        const { post, telemetry } = setup()

        const response = await post('{"message": ')

        assert.strictEqual(response.status, 400)
        assert.deepStrictEqual(response.jsonBody, {
            success: false,
            error: { code: 'InvalidJson', message: 'Request body must be valid JSON' },
            correlationId: 'corr-1'
        })
        const [rejected] = telemetry.eventsNamed('Chat.Turn.Rejected')
        assert.strictEqual(rejected?.properties?.['error.code'], 'InvalidJson')
        assert.strictEqual(rejected?.properties?.['error.kind'], 'validation')
    })

    test('a missing message is a validation error', async () => {
        const { post, runtime } = setup()

        const response = await post({})

        assert.strictEqual(response.status, 400)
        assert.deepStrictEqual(response.jsonBody, {
            success: false,
            error: { code: 'ValidationError', message: 'message: message is required' },
            correlationId: 'corr-1',
            errors: undefined
        })
        assert.strictEqual(runtime.calls.length, 0)
    })

    test('every invalid field is listed', async () => {
        const { post } = setup()

        const response = await post({ message: 5, threadId: '' })

        assert.strictEqual(response.status, 400)
        assert.deepStrictEqual(response.jsonBody?.errors, [
            { code: 'ValidationError', message: 'message: message must be a string' },
            { code: 'ValidationError', message: 'threadId: threadId must not be empty' }
        ])
    })

    test('a blank message is rejected by the orchestrator with 400', async () => {
        const { post, runtime } = setup()

        const response = await post({ message: '   ' })

        assert.strictEqual(response.status, 400)
        assert.deepStrictEqual(response.jsonBody?.error, { code: 'ValidationError', message: 'Message is required' })
        assert.strictEqual(runtime.calls.length, 0)
    })

    test('no enabled tools answers informationally', async () => {
        const { post } = setup({ tools: [] })

        const response = await post({ message: 'hello' })

        assert.strictEqual(response.status, 200)
        assert.strictEqual(response.jsonBody?.data?.outcome, 'no-tools')
        assert.strictEqual(response.jsonBody?.data?.response, NO_TOOLS_CONFIGURED_MESSAGE)
    })

    test('no enabled tools with requireTools is a 503', async () => {
        const { post } = setup({ tools: [] })

        const response = await post({ message: 'hello', requireTools: true })

        assert.strictEqual(response.status, 503)
        assert.deepStrictEqual(response.jsonBody?.error, { code: 'ServiceUnavailable', message: NO_TOOLS_CONFIGURED_MESSAGE })
    })

    test('an unconfigured runtime is a 503', async () => {
        const { container, post } = setup({ foundryConfigured: false })
        container.rebind<IConversationRuntime>(TOKENS.ConversationRuntime).to(NullConversationRuntime)

        const response = await post({ message: 'hello' })

        assert.strictEqual(response.status, 503)
        assert.strictEqual(response.jsonBody?.error?.code, 'ServiceUnavailable')
    })

    test('a failed run is a 502 with the runtime message', async () => {
        const { post, telemetry } = setup({ steps: [{ status: 'failed', error: 'Rate limit exceeded' }] })

        const response = await post({ message: 'hello' })

        assert.strictEqual(response.status, 502)
        assert.deepStrictEqual(response.jsonBody, {
            success: false,
            error: { code: 'UpstreamFailure', message: 'Rate limit exceeded' },
            correlationId: 'corr-1'
        })
        const [rejected] = telemetry.eventsNamed('Chat.Turn.Rejected')
        assert.strictEqual(rejected?.properties?.['error.kind'], 'upstream')
        assert.strictEqual(rejected?.properties?.status, 502)
    })

    test('an unexpected error is a 500 and is tracked as an exception', async () => {
        const { post, runtime, telemetry, messages } = setup()
        runtime.failures.createAgent = new Error('socket hang up')

        const response = await post({ message: 'hello' })

        assert.strictEqual(response.status, 500)
        assert.deepStrictEqual(response.jsonBody?.error, { code: 'InternalError', message: 'socket hang up' })
        assert.deepStrictEqual(messages('error'), ['Agent run failed: socket hang up', 'Unhandled error: socket hang up'])
        assert.strictEqual(telemetry.exceptions.length, 1)
    })
})
