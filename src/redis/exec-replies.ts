export type ExecReplies = [Error | null, unknown][];

/**
 * Unwraps a MULTI/EXEC result, surfacing the first per-command error that
 * ioredis reports inline instead of rejecting.
 */
export function checkReplies(replies: ExecReplies | null): ExecReplies {
  if (!replies) {
    throw new Error('Transaction aborted');
  }
  const failed = replies.find(([error]) => error !== null);
  if (failed?.[0]) {
    throw failed[0];
  }
  return replies;
}
