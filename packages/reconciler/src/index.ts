/**
 * @flashsync/reconciler - Push, sync and merge between deck files and the card service.
 */

export {
  buildRemoteIndex,
  cardFromRemote,
  planPush,
  planSync,
  planIsEmpty,
  summarizePlan,
  type DuplicateMatch,
  type OperationSet,
  type PlanMode,
  type PlanSummary,
  type RemoteIndex,
} from './plan.js';

export {
  applyPlan,
  PartialApplyError,
  type ApplyCounts,
  type ApplyOptions,
  type ApplyResult,
} from './apply.js';

export {
  mergeThreeWay,
  type ConflictKind,
  type MergeConflict,
  type MergeResult,
  type MergeStats,
} from './merge.js';

export { BaseStore } from './base-store.js';

export {
  pullDeck,
  pushDeckFile,
  syncDeckFile,
  pushAllDeckFiles,
  type BatchPushOutcome,
  type PullOutcome,
  type ReconcileOptions,
  type ReconcileOutcome,
  type ReconcileStatus,
  type WorkflowContext,
  type WorkflowEvent,
} from './workflows.js';
