/**
 * decigraph public API.
 *
 * The pure graph functions (validate, cascade, frontier, ...) take a loaded
 * `DecisionGraph`; `DecisionService` wraps them with loading and persistence
 * over a `DecisionStore`.
 */

export * from "./graph/types.js";
export { parseDocument, serializeDocument, SCAFFOLD_BODY, isoDate } from "./graph/frontmatter.js";
export { buildGraph, getDependents, getDepsList, toDecisionNode } from "./graph/loader.js";

export { validate, findCycles } from "./validators/graph-validator.js";
export { lintBody } from "./validators/body-linter.js";
export {
  validateForCreate,
  validateForSet,
  validateTransition,
  type SetValue,
  type TransitionCheck,
} from "./validators/mutation-validator.js";

export { cascade, CASCADE_DIRECTIONS, type CascadeDirection, type CascadeResult } from "./analysis/cascade.js";
export { frontier, criticalPath, DEFAULT_TOP_N, type FrontierResult } from "./analysis/frontier.js";
export { searchDecisions, type SearchResult } from "./analysis/search.js";
export { compileManifest, type CompiledManifest, type ManifestTarget } from "./analysis/manifest.js";
export { renderHealth, renderIndex } from "./analysis/reports.js";

export { loadLintConfig, parseLintConfig, EMPTY_LINT_CONFIG, type LintConfig } from "./config/lint-config.js";
export { getConfig, type Config } from "./config/index.js";

export type { DecisionStore, StoredDocument } from "./store/interface.js";
export { FileDecisionStore, InMemoryDecisionStore } from "./store/decision-store.js";
export { ScratchpadStore, type ScratchpadEntry } from "./store/scratchpad-store.js";

export {
  DecisionService,
  type CreateDecisionInput,
  type CreateResult,
  type EditResult,
  type SetResult,
  type ValidationReport,
} from "./services/decision-service.js";

export {
  DecisionGraphError,
  EditConflictError,
  GraphLoadError,
  NotFoundError,
  UsageError,
  type ErrorCode,
} from "./utils/errors.js";
