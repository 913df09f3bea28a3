import { config } from '../config';

// One-time warning utility; silent unless `config.warnings` is on.
const seen = new Set<string>();
export function onceWarn(key: string, message: string) {
  if (!config.warnings || seen.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Forget which keys already warned (tests). */
export function resetWarnings() {
  seen.clear();
}
