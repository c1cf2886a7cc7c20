import type { Citation } from '@foundry-mcp-chat/shared'
import { injectable } from 'inversify'
import type { ThreadMessage } from './conversationRuntime.js'

export interface ExtractedResponse {
    text: string
    citations: Citation[]
}

/**
 * Pulls the final answer out of a completed run's thread.
 *
 * The most recent assistant message wins (latest `createdAt`, later position on ties).
 * Given a run id, assistant messages tagged with another run are skipped, so a reused
 * thread never answers with an earlier turn's reply.
 * Text items are concatenated without a separator; url citations keep their order
 * and are not deduplicated.
 */
@injectable()
export class ResponseExtractor {
    extract(messages: readonly ThreadMessage[], runId?: string): ExtractedResponse {
        let latest: ThreadMessage | undefined
        for (const message of messages) {
            if (message.role !== 'assistant') continue
            if (runId !== undefined && message.runId !== undefined && message.runId !== runId) continue
            if (!latest || message.createdAt >= latest.createdAt) {
                latest = message
            }
        }
        if (!latest) {
            return { text: '', citations: [] }
        }

        let text = ''
        const citations: Citation[] = []
        for (const item of latest.content) {
            if (item.type !== 'text') continue
            text += item.text
            for (const annotation of item.annotations) {
                if (annotation.type === 'url_citation') {
                    citations.push({ title: annotation.title || annotation.url, url: annotation.url })
                }
            }
        }
        return { text, citations }
    }
}
