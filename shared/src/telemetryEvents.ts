// Canonical telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: every event emitted by the backend must be declared here.
// To verify no inline usage outside the registry:
// grep -rn "trackEvent\(\|trackEventStrict('" --include="*.ts" backend/src | grep -v telemetryEvents

export const TELEMETRY_EVENT_NAMES = [
    // Service / utility
    'Health.Checked',
    'Telemetry.EventName.Invalid',
    // Chat surface
    'Chat.Turn.Requested',
    'Chat.Turn.Rejected',
    // Agent run lifecycle
    'Agent.Run.Started',
    'Agent.Run.Completed',
    'Agent.Run.Failed',
    'Agent.Run.Cancelled',
    'Agent.Run.TimedOut',
    'Agent.Run.NoTools',
    'Agent.ToolBatch.Submitted',
    'Agent.Cleanup.Failed',
    // MCP tool dispatch
    'Mcp.Tool.Invoked',
    'Mcp.Arguments.Repaired',
    'Mcp.Arguments.Invalid',
    'Mcp.Tools.Discovered',
    'Mcp.Session.TerminateFailed',
    // Secrets (gateway credential resolution)
    'Secret.Cache.Hit',
    'Secret.Cache.Miss',
    'Secret.Cache.Clear',
    'Secret.Fetch.Success',
    'Secret.Fetch.Failure',
    'Secret.Fetch.Retry'
] as const

export type TelemetryEventName = (typeof TELEMETRY_EVENT_NAMES)[number]

export function isTelemetryEventName(name: string): name is TelemetryEventName {
    return (TELEMETRY_EVENT_NAMES as readonly string[]).includes(name)
}

// Regex shared with the lint rule that checks event literals
export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
