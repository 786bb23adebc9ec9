/**
 * Logging notifier: the default PostingNotifier
 *
 * Writes one debug line per new posting. Real downstream transports
 * (websocket broadcast, webhooks) implement the same interface.
 */

import type { Logger, NewPostingEvent } from "@/types";
import type { PostingNotifier } from "@/interfaces";
import * as defaultLogger from "@/logger";

export function createLoggingNotifier(logger: Logger = defaultLogger): PostingNotifier {
  return {
    notifyNewPosting(event: NewPostingEvent): void {
      logger.debug("New posting", {
        postingId: event.posting.id,
        owner: event.ownerName,
        title: event.posting.title,
        category: event.posting.category,
        link: event.posting.link,
        emittedAt: event.emittedAt,
      });
    },
  };
}
