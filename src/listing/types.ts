/**
 * Listing Types
 */

import type { Account } from '../accounts/types.js';

/**
 * The matched route of the current request.
 */
export interface RouteMatch {
  /** Account behind the `{user}` route parameter */
  user: Account | null;
  /** Path of the current request, used for destinations */
  path: string;
}

export interface Link {
  title: string;
  url: string;
}

export interface Operation extends Link {
  weight: number;
}

export interface AppNameCell {
  text: string;
  url?: string;
}

export interface AppRow {
  /** Unique HTML id of the row */
  id: string;
  name: AppNameCell;
  status: string;
  operations: Record<string, Operation>;
}

export interface AppListing {
  title: string;
  table: {
    rows: AppRow[];
    empty: string;
  };
  addLink: Link | null;
  warnings: string[];
}

export interface Redirect {
  status: 302;
  location: string;
}
