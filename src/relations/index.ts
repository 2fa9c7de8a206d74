/**
 * Relation tracker exports
 */

export type {
  RelationFields,
  RelationKind,
  RelationName,
  RelationSnapshot,
  RelationDeclaration,
  RelationState,
  RelationStatus,
} from './types.js';

export { RELATION_NAMES, RELATION_DECLARATIONS, getRelationDeclaration, isRelationName } from './metadata.js';

export {
  RelationTracker,
  fieldsEqual,
  fromRelationSnapshot,
  mergeFields,
  toRelationSnapshot,
} from './tracker.js';
