import type { InvocationDescriptor, TelemetryConfig } from "@fnbridge/core";

/** Fully enabled, always sampled, every event kind */
export function testTelemetryConfig(overrides: Partial<TelemetryConfig> = {}): TelemetryConfig {
  return {
    enabled: true,
    sampleRate: 1,
    events: ["start", "stop", "exception"],
    prefix: ["fnbridge"],
    metadata: [],
    ...overrides,
  };
}

export function testDescriptor(overrides: Partial<InvocationDescriptor> = {}): InvocationDescriptor {
  return {
    client: "support",
    functionName: "AnalyzeTicket",
    args: { ticket: "printer on fire" },
    resource: "Helpdesk.Ticket",
    action: "analyze_ticket",
    telemetry: testTelemetryConfig(),
    ...overrides,
  };
}
