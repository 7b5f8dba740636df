import type { Assignment } from '@alphametic/core';
import type { Constraint } from './constraints.js';
import { isSatisfied } from './constraints.js';

/**
 * Symbolic check of a finished assignment: returns the constraints it
 * violates, empty when it is a solution.
 */
export function verifyAssignment(
  constraints: readonly Constraint[],
  assignment: Assignment
): Constraint[] {
  return constraints.filter(constraint => !isSatisfied(constraint, assignment));
}
