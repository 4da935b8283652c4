export * from './kernel-core/Errors.js';
export * from './kernel-core/Config.js';
export * from './kernel-core/Kernel.js';
export * from './kernel-core/L0/Ontology.js';
export * from './kernel-core/L0/Clock.js';
export * from './kernel-core/L0/Guards.js';
export { ReplayEngine, type ReplayReport } from './kernel-core/L0/Replay.js';
export { RoleSet, Authority } from './kernel-core/L1/Identity.js';
export * from './kernel-core/L2/ComponentRegistry.js';
export * from './kernel-core/L2/ComponentHost.js';
export * from './kernel-core/L4/UpgradeGovernance.js';
export * from './kernel-core/L5/Audit.js';
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { RegistryServer, PRINCIPAL_HEADER, statusFor } from './server/Server.js';
