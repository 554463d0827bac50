// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a debate ID with "deb_" prefix. */
export function generateDebateId(): string {
  return `deb_${nanoid(21)}`;
}

