/**
 * OTel SDK initialization.
 *
 * Lazy-loaded: OTel SDK packages are only imported when OTEL_ENABLED=true,
 * so nothing is loaded when export is off.
 */

import { getDefaultBus } from "./bus.js";
import { createOtelSubscriber } from "./otel-subscriber.js";
import type { OtelSetupConfig } from "./types.js";

let initialized = false;

/** Reference to the NodeSDK for shutdown */
let sdkInstance: { shutdown(): Promise<void> } | undefined;

let unsubscribe: (() => void) | undefined;

/**
 * True only when OTEL_ENABLED is "true" or "1".
 */
export function isOtelEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.OTEL_ENABLED;
  return value === "true" || value === "1";
}

/**
 * Start the OpenTelemetry Node SDK and subscribe span export to the bus.
 *
 * Configures:
 * - OTLP HTTP trace exporter at `${endpoint}/v1/traces`
 * - ParentBasedSampler over TraceIdRatioBasedSampler
 * - Resource with service.name, service.version, deployment.environment
 *
 * @returns true if the SDK was started, false if disabled or already running
 */
export async function setupTelemetry(config?: OtelSetupConfig): Promise<boolean> {
  if (!isOtelEnabled()) {
    return false;
  }

  if (initialized) {
    return false;
  }

  const { NodeSDK } = await import("@opentelemetry/sdk-node");
  const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
  const { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } = await import(
    "@opentelemetry/semantic-conventions"
  );
  const { Resource } = await import("@opentelemetry/resources");
  const { ParentBasedSampler, TraceIdRatioBasedSampler } = await import(
    "@opentelemetry/sdk-trace-base"
  );

  const serviceName = config?.serviceName ?? process.env.OTEL_SERVICE_NAME ?? "fnbridge";
  const endpoint =
    config?.endpoint ?? process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318";
  const rawRatio = config?.sampleRatio ?? parseFloat(process.env.OTEL_TRACES_SAMPLER_ARG ?? "1.0");
  const sampleRatio = Number.isNaN(rawRatio) ? 1.0 : Math.max(0, Math.min(1, rawRatio));
  const environment = config?.environment ?? process.env.OTEL_ENVIRONMENT ?? "development";

  const sdk = new NodeSDK({
    resource: new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
      [ATTR_SERVICE_VERSION]: process.env.npm_package_version ?? "0.0.0",
      "deployment.environment": environment,
    }),
    traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
    sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRatio) }),
  });

  sdk.start();

  const bus = config?.bus ?? getDefaultBus();
  unsubscribe = bus.subscribe(createOtelSubscriber().handle);

  sdkInstance = sdk;
  initialized = true;

  return true;
}

/**
 * Flush pending spans, stop the SDK and detach from the bus.
 *
 * Safe to call even if telemetry was never initialized.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (sdkInstance !== undefined) {
    unsubscribe?.();
    unsubscribe = undefined;
    await sdkInstance.shutdown();
    sdkInstance = undefined;
    initialized = false;
  }
}
