import type { MessageLog } from "./message-log.js";
import type { ModerationConfig } from "./types.js";

export interface RateLimitResult {
  readonly limited: boolean;
  readonly count: number;
  readonly detail: string;
}

type WindowConfig = Pick<ModerationConfig, "maxMessagesPerWindow" | "windowMinutes">;

/**
 * Sliding window over the persisted message log. The window is recomputed
 * on every call and the message being checked is not yet logged.
 */
export class RateLimiter {
  constructor(
    private readonly log: MessageLog,
    private readonly config: () => WindowConfig,
  ) {}

  check(identity: string): RateLimitResult {
    const { maxMessagesPerWindow, windowMinutes } = this.config();
    const since = Date.now() - windowMinutes * 60_000;
    const count = this.log.countSince(identity, since);
    const window = `${count} messages in last ${windowMinutes} minutes`;

    if (count >= maxMessagesPerWindow) {
      return { limited: true, count, detail: `Rate limit exceeded: ${window}` };
    }
    return { limited: false, count, detail: window };
  }
}
