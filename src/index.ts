/**
 * Constitutional Kernel: six-gate policy evaluation engine.
 */
export * from './kernel-core/L0/Ontology.js';
export { createProposal, ProposalSchema, EvidenceItemSchema } from './kernel-core/L0/ProposalSchema.js';
export type { ProposalInput } from './kernel-core/L0/ProposalSchema.js';
export { EnergyBudget } from './kernel-core/L0/EnergyBudget.js';
export { hash, canonicalize, hashCanonical, GENESIS_HASH } from './kernel-core/L0/Crypto.js';
export { EvidenceAggregator, phaseForEntityCount, TIER_WEIGHTS, PHASE_MIN_TIER } from './kernel-core/L1/Evidence.js';
export type { EvidenceScore } from './kernel-core/L1/Evidence.js';
export { GATES, FATAL_GATES } from './kernel-core/L2/Gates.js';
export type { Gate, EvaluationContext } from './kernel-core/L2/Gates.js';
export { GatePipeline } from './kernel-core/L2/GatePipeline.js';
export type { PipelineContext, PipelineRun } from './kernel-core/L2/GatePipeline.js';
export { AuditLog, computeRecordHash, toWire, fromWire } from './kernel-core/L5/Audit.js';
export type { AuditRecord, AuditRecordWire, ChainVerification, IEventStore } from './kernel-core/L5/Audit.js';
export { EscalationLedger } from './kernel-core/L5/Escalation.js';
export type { Acknowledgment } from './kernel-core/L5/Escalation.js';
export { Orchestrator, WorkerPool, dependencyOrder } from './kernel-core/L6/Orchestrator.js';
export type { CoordinateOptions } from './kernel-core/L6/Orchestrator.js';
export { Gatekeeper } from './kernel-core/Gatekeeper.js';
export type { CheckOptions, KernelMetrics } from './kernel-core/Gatekeeper.js';
export { createConfig, configFromEnv, DEFAULT_CONFIG, GIB } from './kernel-core/Config.js';
export type { KernelConfig, ConfigOverrides, PhaseSource } from './kernel-core/Config.js';
export { SystemClock, FixedStepClock } from './kernel-core/Ports.js';
export type { ISystemClock } from './kernel-core/Ports.js';
export * from './kernel-core/Errors.js';
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { GatekeeperServer } from './server/Server.js';
