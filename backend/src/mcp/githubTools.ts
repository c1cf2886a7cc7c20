import type { ToolDefinition } from '@foundry-mcp-chat/shared'

const owner = { type: 'string', description: 'Repository owner' } as const
const repo = { type: 'string', description: 'Repository name' } as const

/** GitHub tools advertised to the agent, in the order the model sees them. */
export const GITHUB_TOOL_DEFINITIONS: readonly ToolDefinition[] = [
    {
        name: 'search_repositories',
        description:
            "Search for GitHub repositories using GitHub search syntax in 'query' (e.g., 'language:javascript pushed:>=2026-01-01'). Do not pass sort-only strings like 'sort:updated-desc' as the query.",
        parameters: {
            type: 'object',
            properties: {
                query: {
                    type: 'string',
                    description:
                        "GitHub repository search query (must include at least one keyword or qualifier, e.g. 'azure pushed:>=2026-01-01' or 'language:javascript stars:>100')"
                }
            },
            required: ['query']
        }
    },
    {
        name: 'get_file_contents',
        description: 'Get the contents of a file from a GitHub repository',
        parameters: {
            type: 'object',
            properties: { owner, repo, path: { type: 'string', description: 'File path' } },
            required: ['owner', 'repo', 'path']
        }
    },
    {
        name: 'create_or_update_file',
        description: 'Create or update a file in a GitHub repository',
        parameters: {
            type: 'object',
            properties: {
                owner,
                repo,
                path: { type: 'string', description: 'File path' },
                content: { type: 'string', description: 'File content' },
                message: { type: 'string', description: 'Commit message' },
                branch: { type: 'string', description: 'Branch name' }
            },
            required: ['owner', 'repo', 'path', 'content', 'message', 'branch']
        }
    },
    {
        name: 'list_issues',
        description: 'List issues in a GitHub repository',
        parameters: {
            type: 'object',
            properties: { owner, repo },
            required: ['owner', 'repo']
        }
    },
    {
        name: 'create_issue',
        description: 'Create a new issue in a GitHub repository',
        parameters: {
            type: 'object',
            properties: {
                owner,
                repo,
                title: { type: 'string', description: 'Issue title' },
                body: { type: 'string', description: 'Issue body' }
            },
            required: ['owner', 'repo', 'title']
        }
    },
    {
        name: 'create_pull_request',
        description: 'Create a new pull request in a GitHub repository',
        parameters: {
            type: 'object',
            properties: {
                owner,
                repo,
                title: { type: 'string', description: 'PR title' },
                body: { type: 'string', description: 'PR body' },
                head: { type: 'string', description: 'Source branch' },
                base: { type: 'string', description: 'Target branch' }
            },
            required: ['owner', 'repo', 'title', 'head', 'base']
        }
    }
]
