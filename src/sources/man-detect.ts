/**
 * Man Command Detection
 *
 * Decides whether a positional argument is a man invocation
 * (`man grep`, `MANWIDTH=80 man 3 printf`) rather than a file name.
 */

/**
 * True for an argument that starts with `man `, or that runs man after
 * an environment prefix with something following the `man` word.
 */
export function isManCommandArg(arg: string): boolean {
  if (arg.startsWith('man ')) return true;
  const index = arg.indexOf(' man ');
  if (index === -1) return false;
  return arg.slice(index + 5).trim().length > 0;
}
