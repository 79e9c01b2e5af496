/**
 * Stages of one validated decode, in execution order.
 */
export type PipelineStage = 'decoding' | 'schemaChecking' | 'deserializing' | 'validating';
