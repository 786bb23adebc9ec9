/**
 * PostingNotifier interface: downstream broadcast of new postings
 */

import type { NewPostingEvent } from "@/types";

export interface PostingNotifier {
  /**
   * Called once per newly created posting, after its batch committed.
   * Delivery is fire-and-forget: rejections are logged by the caller.
   */
  notifyNewPosting(event: NewPostingEvent): void | Promise<void>;
}
