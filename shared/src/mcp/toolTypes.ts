/**
 * MCP tool contracts shared by the catalog, the invoker and the discovery endpoint.
 */

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }
export type JsonObject = { [key: string]: JsonValue }

export function isJsonValue(value: unknown): value is JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return true
    if (typeof value === 'number') return Number.isFinite(value)
    if (Array.isArray(value)) return value.every(isJsonValue)
    if (typeof value === 'object') return Object.values(value).every(isJsonValue)
    return false
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value)
}

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object'

export interface ToolParameterProperty {
    type: ToolParameterType
    description: string
}

/** JSON-schema subset used to describe tool inputs to the model. */
export interface ToolParametersSchema {
    type: 'object'
    properties: Record<string, ToolParameterProperty>
    required: readonly string[]
}

export interface ToolDefinition {
    name: string
    description: string
    parameters: ToolParametersSchema
}

export interface ToolSuccessPayload {
    success: true
    function: string
    result: JsonValue
}

/**
 * Failure shape fed back to the model as ordinary tool output.
 * `error` and `howToFix` phrasing is matched by prompts and tests; keep it stable.
 */
export interface ToolFailurePayload {
    success: false
    function: string
    error: string
    howToFix?: string
}

export type ToolOutputPayload = ToolSuccessPayload | ToolFailurePayload

export function isToolFailurePayload(payload: ToolOutputPayload): payload is ToolFailurePayload {
    return payload.success === false
}

export function toolFailure(toolName: string, error: string, howToFix?: string): ToolFailurePayload {
    return howToFix ? { success: false, function: toolName, error, howToFix } : { success: false, function: toolName, error }
}

/** JSON-RPC `tools/list` shaped document served by the discovery endpoint. */
export interface McpDiscoveryDocument {
    jsonrpc: '2.0'
    id: number
    result: {
        tools: Array<{
            name: string
            description: string
            inputSchema: ToolParametersSchema
        }>
    }
}
