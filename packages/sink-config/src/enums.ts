/**
 * Closed vocabularies for the sink's behavioral settings
 */

import { closedSet } from '@docsink/core';

/** What to do with records that have a key but a null value (tombstones) */
export const BEHAVIOR_ON_NULL_VALUES = closedSet(['ignore', 'delete', 'fail'], 'ignore');
export type BehaviorOnNullValues = ReturnType<typeof BEHAVIOR_ON_NULL_VALUES.defaultValue>;

/** What to do with documents the backend rejects as malformed */
export const BEHAVIOR_ON_MALFORMED_DOCS = closedSet(['ignore', 'warn', 'fail'], 'fail');
export type BehaviorOnMalformedDocs = ReturnType<typeof BEHAVIOR_ON_MALFORMED_DOCS.defaultValue>;

export const WRITE_METHOD = closedSet(['insert', 'upsert'], 'insert');
export type WriteMethod = ReturnType<typeof WRITE_METHOD.defaultValue>;

export const SECURITY_PROTOCOL = closedSet(['PLAINTEXT', 'SSL'], 'PLAINTEXT');
export type SecurityProtocol = ReturnType<typeof SECURITY_PROTOCOL.defaultValue>;

/** How document versions are derived from the incoming record */
export const DOCUMENT_VERSION_TYPE = closedSet(
  ['legacy', 'unused', 'message-offset', 'message-timestamp', 'combined-timestamp-offset'],
  'legacy'
);
export type DocumentVersionType = ReturnType<typeof DOCUMENT_VERSION_TYPE.defaultValue>;
