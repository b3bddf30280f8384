export type MetricType = "counter" | "histogram" | "gauge";

export type MetricCatalogEntry = {
  metric_name: string;
  type: MetricType;
  description: string;
  tags: readonly string[];
  unit: string;
};

export const METRIC_CATALOG = [
  {
    metric_name: "system.error.count",
    type: "counter",
    description: "Unhandled runtime errors across webhook, operator and worker surfaces.",
    tags: ["component", "phase", "error_name"],
    unit: "count",
  },
  {
    metric_name: "system.request.latency",
    type: "histogram",
    description: "Latency for HTTP handlers served by the engine process.",
    tags: ["component", "operation", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "conversation.event.count",
    type: "counter",
    description: "Inbound events processed by the conversation engine, by outcome.",
    tags: ["component", "outcome"],
    unit: "count",
  },
  {
    metric_name: "conversation.command.count",
    type: "counter",
    description: "Global command tokens intercepted before dispatch.",
    tags: ["component", "command"],
    unit: "count",
  },
  {
    metric_name: "conversation.transition.latency",
    type: "histogram",
    description: "Time spent resolving and committing a session transition.",
    tags: ["component", "route", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "conversation.concurrency.conflict",
    type: "counter",
    description: "Compare-and-swap conflicts on session save.",
    tags: ["component"],
    unit: "count",
  },
  {
    metric_name: "outbound.message.delivered",
    type: "counter",
    description: "Outbound messages accepted by the gateway.",
    tags: ["component", "payload_kind"],
    unit: "count",
  },
  {
    metric_name: "outbound.message.retried",
    type: "counter",
    description: "Transient send failures scheduled for retry.",
    tags: ["component", "attempt"],
    unit: "count",
  },
  {
    metric_name: "outbound.message.dead_lettered",
    type: "counter",
    description: "Outbound messages moved to the dead-letter store.",
    tags: ["component", "failure_reason"],
    unit: "count",
  },
  {
    metric_name: "outbound.rate_limit.deferred",
    type: "counter",
    description: "Sends deferred because a token bucket was empty.",
    tags: ["component", "limiter"],
    unit: "count",
  },
  {
    metric_name: "outbound.send.latency",
    type: "histogram",
    description: "Gateway round-trip time for a single send attempt.",
    tags: ["component", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "outbound.queue.depth",
    type: "gauge",
    description: "Messages waiting in the delivery queue after each worker pass.",
    tags: ["component"],
    unit: "count",
  },
] as const satisfies readonly MetricCatalogEntry[];

export type MetricName = (typeof METRIC_CATALOG)[number]["metric_name"];

export const METRIC_CATALOG_BY_NAME: Readonly<Record<string, MetricCatalogEntry>> = Object.freeze(
  Object.fromEntries(METRIC_CATALOG.map((entry) => [entry.metric_name, entry])),
);

const METRIC_NAME_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/;
const TAG_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function isMetricName(value: string): value is MetricName {
  return Object.prototype.hasOwnProperty.call(METRIC_CATALOG_BY_NAME, value);
}

export function validateMetricCatalog(
  entries: readonly MetricCatalogEntry[] = METRIC_CATALOG,
): { valid: true } {
  const seenNames = new Set<string>();
  for (const entry of entries) {
    if (!METRIC_NAME_PATTERN.test(entry.metric_name)) {
      throw new Error(`Invalid metric_name '${entry.metric_name}'.`);
    }
    if (seenNames.has(entry.metric_name)) {
      throw new Error(`Duplicate metric_name '${entry.metric_name}'.`);
    }
    seenNames.add(entry.metric_name);

    if (entry.description.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty description.`);
    }

    const seenTags = new Set<string>();
    for (const tag of entry.tags) {
      if (!TAG_NAME_PATTERN.test(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has invalid tag '${tag}'.`);
      }
      if (seenTags.has(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has duplicate tag '${tag}'.`);
      }
      seenTags.add(tag);
    }
  }
  return { valid: true };
}

validateMetricCatalog(METRIC_CATALOG);
