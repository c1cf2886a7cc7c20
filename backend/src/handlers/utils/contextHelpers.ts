/**
 * Context helper utilities for Azure Functions handlers.
 */
import type { InvocationContext } from '@azure/functions'
import { Container } from 'inversify'

export const CONTAINER_EXTRA_INPUT = 'container'

/**
 * Get the inversify container placed on the invocation context by the preInvocation hook.
 */
export function getContainer(context: InvocationContext): Container {
    const container = context.extraInputs.get(CONTAINER_EXTRA_INPUT)
    if (!(container instanceof Container)) {
        throw new Error('DI container is not available on the invocation context')
    }
    return container
}
