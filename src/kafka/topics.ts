/**
 * Zonekeeper Kafka topic definitions.
 * All topics are prefixed with the configured topicPrefix.
 */

export const TOPICS = {
  /** Reconcile call lifecycle (started/completed) */
  RECONCILES: "reconciles",
  /** Every zone state observed while polling, partitioned by zone id */
  ZONE_STATES: "zone-states",
  /** Failed reconcile calls with their diagnostic */
  DIAGNOSTICS: "diagnostics",
} as const;

export type TopicName = (typeof TOPICS)[keyof typeof TOPICS];

export function resolveTopicName(prefix: string, topic: TopicName): string {
  return `${prefix}.${topic}`;
}

/** Map event types to their target topics */
export function eventTypeToTopic(eventType: string): TopicName {
  if (eventType === "reconcile.failed") return TOPICS.DIAGNOSTICS;
  if (eventType.startsWith("reconcile.")) return TOPICS.RECONCILES;
  if (eventType.startsWith("zone.")) return TOPICS.ZONE_STATES;
  return TOPICS.RECONCILES;
}
