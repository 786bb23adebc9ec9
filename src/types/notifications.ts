/**
 * Notification type definitions
 */

import type { PostingRow } from "./db";

/**
 * Payload emitted after a new posting is committed
 */
export type NewPostingEvent = {
  posting: PostingRow;
  ownerName: string;
  /** ISO timestamp of emission */
  emittedAt: string;
};
