// Sync Services - Re-exports
export {
  classifyValue,
  extractContactData,
  extractMembershipLevel,
  extractTagId,
  extractTrainingLabels,
  parseContact,
  parseTagId,
  type ContactData,
  type FieldValueShape,
} from "./extract.js";
export {
  ReconcileService,
  replaceTrainingLinks,
  type ReconcileResult,
  type SkippedContact,
} from "./reconcile.js";
export {
  SyncCycle,
  type CycleOutcome,
  type CycleRunner,
  type CycleStage,
  type SyncCycleDeps,
} from "./cycle.js";
