export { generateTopic } from './topic-generator.js';
export type { GenerateTopicOptions } from './topic-generator.js';
