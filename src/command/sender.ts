/**
 * A sender subtype a command may be restricted to. The builder trusts the
 * narrowing; dispatchers must check `is` before invoking the command's handler.
 */
export interface SenderType<S> {
  readonly name: string;
  is(sender: unknown): sender is S;
}

export function senderType<S>(
  name: string,
  is: (sender: unknown) => sender is S,
): SenderType<S> {
  return { name, is };
}
