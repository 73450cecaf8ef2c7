/**
 * Types for the item store
 */

/** Item as stored: snake_case columns, timestamps in epoch milliseconds */
export interface Item {
  id: number;
  name: string;
  description: string;
  created_at: number;
  updated_at: number;
}
