/**
 * @alphametic/puzzle - Finite-domain engine for verbal arithmetic
 *
 * Components:
 * - Alphabet: distinct letters in first-occurrence order
 * - DomainStore: candidate digits per letter with undo-trail snapshots
 * - Constraints: non-zero, all-different and the column sum
 * - Propagator: forced reductions to a fixpoint
 * - SearchEngine: MRV backtracking, first solution only
 * - AlphameticSolver: validation, search and result projection
 */

export {
  AlphameticSolver,
  solve,
  parsePuzzle,
  DEFAULT_SOLVER_CONFIG,
  SolverConfigSchema,
  type SolverConfig,
} from './solver.js';
export { Alphabet, extractAlphabet } from './alphabet.js';
export {
  DomainStore,
  FULL_MASK,
  EMPTY_MASK,
  maskOf,
  digitsOf,
  hasDigit,
  popcount,
  type DigitMask,
  type DomainSnapshot,
  type NarrowResult,
} from './domain-store.js';
export {
  buildConstraints,
  isSatisfied,
  describeConstraint,
  wordValue,
  type Constraint,
} from './constraints.js';
export { Propagator, toColumns, type Column, type PropagationStatus } from './propagator.js';
export {
  SearchEngine,
  DEFAULT_SEARCH_CONFIG,
  type SearchConfig,
  type SearchOutcome,
} from './search.js';
export { buildFoundOutcome } from './result-builder.js';
export { verifyAssignment } from './verifier.js';
