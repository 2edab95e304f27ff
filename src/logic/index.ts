/**
 * Core logic: terms, substitutions, unification, premise solving, rules.
 */

export * from './terms.js';
export * from './substitution.js';
export * from './unify.js';
export * from './solver.js';
export * from './rule.js';
export * from './factBase.js';
export * from './signature.js';
