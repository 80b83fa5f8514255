/**
 * Opaque wrapper for secret values.
 * The plain text is only reachable through value(); every string, JSON and
 * inspect conversion yields the hidden marker.
 */

import { inspect } from 'node:util';

export const HIDDEN = '[hidden]';

export class Password {
  constructor(private readonly secret: string) {}

  /** The secret in plain text */
  value(): string {
    return this.secret;
  }

  equals(other: unknown): boolean {
    return other instanceof Password && other.secret === this.secret;
  }

  toString(): string {
    return HIDDEN;
  }

  toJSON(): string {
    return HIDDEN;
  }

  [inspect.custom](): string {
    return HIDDEN;
  }
}
