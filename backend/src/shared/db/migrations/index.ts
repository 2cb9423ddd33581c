/**
 * Ordered migration registry. Add new migrations here, keyed by file name.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_employees';

export const migrations: Record<string, Migration> = {
  '0001_employees': m0001,
};
