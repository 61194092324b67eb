import pLimit from "p-limit";
import type { RemoteSession } from "./types.js";

/**
 * Wrap a session that cannot serve concurrent reads so that its calls run one at a time,
 * in submission order. Sessions that declare concurrent-read support are returned as is.
 */
export function serializeSession(session: RemoteSession): RemoteSession {
  if (session.supportsConcurrentReads) return session;

  const mutex = pLimit(1);

  return {
    supportsConcurrentReads: true,
    periods: (options) =>
      mutex(() => {
        options.signal?.throwIfAborted();
        return session.periods(options);
      }),
    lessons: (range, options) =>
      mutex(() => {
        options.signal?.throwIfAborted();
        return session.lessons(range, options);
      }),
    homework: (range, options) =>
      mutex(() => {
        options.signal?.throwIfAborted();
        return session.homework(range, options);
      }),
    // Closing is the owner's job and must not queue behind abandoned reads
    close: () => session.close(),
  };
}
