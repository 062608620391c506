/**
 * History compaction types.
 */

import type { HistoryMode } from "../config";
import type { ChatMessage } from "../session/types";

export interface IHistoryCompactor {
  readonly mode: HistoryMode;
  /**
   * Return a shorter history, or `messages` itself when compaction does not apply
   * (below the minimum length, or the summary could not be produced).
   */
  compact(messages: ChatMessage[]): Promise<ChatMessage[]>;
}
