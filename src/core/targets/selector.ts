import type { TargetSelection } from './types.js';

const INLINE_PREFIX = '--target=';

/**
 * Pull the target selector out of a flat argument list.
 *
 * `--target <name>` or `--target=<name>` selects a target by name; `--self`
 * selects the default target unless a name was already given. A `--target`
 * with nothing after it (or an empty `--target=`) is not a selector and stays
 * in `remaining`. Names are not validated here.
 */
export function parseTargetSelector(args: readonly string[], defaultTarget: string): TargetSelection {
  let target: string | undefined;
  const remaining: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const token = args[i];
    if (token === '--target' && i + 1 < args.length) {
      target = args[i + 1];
      i++;
      continue;
    }
    if (token.startsWith(INLINE_PREFIX) && token.length > INLINE_PREFIX.length) {
      target = token.slice(INLINE_PREFIX.length);
      continue;
    }
    if (token === '--self') {
      target = target ?? defaultTarget;
      continue;
    }
    remaining.push(token);
  }

  return { target, remaining };
}
