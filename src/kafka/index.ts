export { EventProducer, type ProducerTransport } from "./producer.js";
export { TOPICS, resolveTopicName, eventTypeToTopic, type TopicName } from "./topics.js";
