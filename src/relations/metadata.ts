/**
 * Relation declarations of the schema registry deployment
 */

import { ValidationFailure } from '../errors.js';
import type { RelationName, RelationDeclaration } from './types.js';

/**
 * Declared relations, keyed by name
 */
export const RELATION_DECLARATIONS: Readonly<Record<RelationName, RelationDeclaration>> = {
  cluster: { name: 'cluster', interfaceName: 'cluster', kind: 'peer' },
  restart: { name: 'restart', interfaceName: 'rolling_op', kind: 'peer' },
  kafka: { name: 'kafka', interfaceName: 'kafka_client', kind: 'requires', limit: 1 },
  certificates: {
    name: 'certificates',
    interfaceName: 'tls-certificates',
    kind: 'requires',
    limit: 1,
    optional: true,
  },
  karapace: { name: 'karapace', interfaceName: 'karapace_client', kind: 'provides' },
  'cos-agent': { name: 'cos-agent', interfaceName: 'cos_agent', kind: 'provides' },
};

/**
 * All declared relation names
 */
export const RELATION_NAMES: readonly RelationName[] = [
  'cluster',
  'restart',
  'kafka',
  'certificates',
  'karapace',
  'cos-agent',
];

/**
 * Type guard for declared relation names
 */
export function isRelationName(value: string): value is RelationName {
  return RELATION_NAMES.some((name) => name === value);
}

/**
 * Look up a relation declaration, rejecting undeclared names
 */
export function getRelationDeclaration(name: string): RelationDeclaration {
  if (!isRelationName(name)) {
    throw new ValidationFailure(
      `Unknown relation "${name}". Declared relations: ${RELATION_NAMES.join(', ')}`,
      name
    );
  }
  return RELATION_DECLARATIONS[name];
}
