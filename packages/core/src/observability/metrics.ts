import {
  METRIC_CATALOG_BY_NAME,
  isMetricName,
  type MetricName,
  type MetricType,
} from "./metrics-catalog.ts";
import { detectRuntimeEnv, type RuntimeEnvironment } from "./runtime-env.ts";

export type MetricTags = Record<string, string | number | boolean | null | undefined>;

export type EmitMetricInput = {
  metric: MetricName | string;
  value: number;
  tags?: MetricTags;
  correlation_id?: string | null;
  ts?: string | Date;
};

export type EmittedMetric = {
  ts: string;
  metric: MetricName;
  type: MetricType;
  unit: string;
  value: number;
  env: RuntimeEnvironment;
  correlation_id: string | null;
  tags: Record<string, string>;
};

export type MetricAdapter = {
  emit(metric: EmittedMetric): void;
};

const MAX_BUFFERED_METRICS = 2_000;
const MAX_TAG_VALUE_LENGTH = 96;
const TAG_KEY_PATTERN = /^[a-z][a-z0-9_]*$/;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/;
const PII_TAG_KEY_PATTERN =
  /(^|_)(phone|recipient|wa_id|sender|email|full_name|message|body|text|caption|gstin|pan)($|_)/i;

class InMemoryMetricAdapter implements MetricAdapter {
  private readonly buffer: EmittedMetric[] = [];

  constructor(private readonly maxEntries: number = MAX_BUFFERED_METRICS) {}

  emit(metric: EmittedMetric): void {
    this.buffer.push(metric);
    if (this.buffer.length > this.maxEntries) {
      this.buffer.splice(0, this.buffer.length - this.maxEntries);
    }
  }

  snapshot(limit?: number): EmittedMetric[] {
    if (!limit || limit <= 0) {
      return [...this.buffer];
    }
    return this.buffer.slice(-limit);
  }

  clear(): void {
    this.buffer.length = 0;
  }
}

const defaultInMemoryAdapter = new InMemoryMetricAdapter();
let activeMetricAdapter: MetricAdapter = defaultInMemoryAdapter;

export function setMetricAdapter(adapter: MetricAdapter): void {
  activeMetricAdapter = adapter;
}

export function resetMetricAdapter(): void {
  activeMetricAdapter = defaultInMemoryAdapter;
}

export function clearInMemoryMetrics(): void {
  defaultInMemoryAdapter.clear();
}

export function getInMemoryMetrics(limit?: number): EmittedMetric[] {
  return defaultInMemoryAdapter.snapshot(limit);
}

export function emitMetric(input: EmitMetricInput): EmittedMetric {
  const metricName = input.metric.trim();
  if (!isMetricName(metricName)) {
    throw new Error(`Unknown metric '${input.metric}'.`);
  }
  const definition = METRIC_CATALOG_BY_NAME[metricName];

  if (!Number.isFinite(input.value)) {
    throw new Error("Metric value must be a finite number.");
  }

  const metric: EmittedMetric = {
    ts: normalizeTimestamp(input.ts),
    metric: metricName,
    type: definition.type,
    unit: definition.unit,
    value: definition.unit === "count" ? Math.round(input.value) : roundToThree(input.value),
    env: detectRuntimeEnv(),
    correlation_id: normalizeTagValue(input.correlation_id),
    tags: sanitizeTags(input.tags),
  };

  activeMetricAdapter.emit(metric);
  return metric;
}

export function emitMetricBestEffort(input: EmitMetricInput): EmittedMetric | null {
  try {
    return emitMetric(input);
  } catch {
    return null;
  }
}

export function emitSystemErrorMetric(input: {
  correlation_id?: string | null;
  component: string;
  phase?: string | null;
  error_name?: string | null;
}): EmittedMetric | null {
  return emitMetricBestEffort({
    metric: "system.error.count",
    value: 1,
    correlation_id: input.correlation_id ?? null,
    tags: {
      component: input.component,
      phase: input.phase ?? "unknown",
      error_name: input.error_name ?? "Error",
    },
  });
}

export function nowMetricMs(): number {
  return performance.now();
}

export function elapsedMetricMs(startedAtMs: number): number {
  const elapsed = nowMetricMs() - startedAtMs;
  if (!Number.isFinite(elapsed) || elapsed < 0) {
    return 0;
  }
  return roundToThree(elapsed);
}

function sanitizeTags(tags?: MetricTags): Record<string, string> {
  if (!tags) {
    return {};
  }

  const output: Record<string, string> = {};
  for (const [rawKey, rawValue] of Object.entries(tags)) {
    const key = rawKey.trim().toLowerCase();
    if (!TAG_KEY_PATTERN.test(key) || PII_TAG_KEY_PATTERN.test(key)) {
      continue;
    }

    const normalizedValue = normalizeTagValue(rawValue);
    if (!normalizedValue || looksLikePhoneNumber(normalizedValue)) {
      continue;
    }

    output[key] = normalizedValue.slice(0, MAX_TAG_VALUE_LENGTH);
  }
  return output;
}

function normalizeTagValue(value: unknown): string | null {
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

function looksLikePhoneNumber(value: string): boolean {
  return PHONE_PATTERN.test(value) && value.replace(/\D/g, "").length >= 10;
}

function normalizeTimestamp(ts?: string | Date): string {
  if (!ts) {
    return new Date().toISOString();
  }
  const parsed = ts instanceof Date ? ts : new Date(ts);
  if (Number.isNaN(parsed.getTime())) {
    return new Date().toISOString();
  }
  return parsed.toISOString();
}

function roundToThree(value: number): number {
  return Math.round(value * 1_000) / 1_000;
}
