import { EventIgnoredError } from '../../../errors/index.js';
import { splitCsv } from '../../sdk/values.js';

export function checkFrom(from: string, filter: unknown): void {
  const allowed = splitCsv(filter);
  if (allowed.length > 0 && !allowed.includes(from)) {
    throw new EventIgnoredError(`From number ${from} not in allowed list`);
  }
}

export function checkBodyContains(body: string, keyword: unknown): void {
  if (typeof keyword !== 'string' || !keyword) return;
  if (!body.toLowerCase().includes(keyword.toLowerCase())) {
    throw new EventIgnoredError(`Body does not contain keyword: ${keyword}`);
  }
}

export function checkBodyRegex(body: string, pattern: unknown): void {
  if (typeof pattern !== 'string' || !pattern) return;

  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new EventIgnoredError(`Invalid regex pattern: ${message}`);
  }
  if (!regex.test(body)) {
    throw new EventIgnoredError(`Body does not match regex: ${pattern}`);
  }
}

export function checkCallStatus(status: string, filter: unknown): void {
  const allowed = splitCsv(filter, { lowercase: true });
  if (allowed.length > 0 && !allowed.includes(status.toLowerCase())) {
    throw new EventIgnoredError(`Call status ${status} not in allowed list`);
  }
}

export function checkProfileName(profileName: string | undefined, filter: unknown): void {
  const allowed = splitCsv(filter, { lowercase: true });
  if (allowed.length === 0) return;
  if (!profileName) {
    throw new EventIgnoredError('Profile name is empty but filter is set');
  }
  if (!allowed.includes(profileName.toLowerCase())) {
    throw new EventIgnoredError(`Profile name ${profileName} not in allowed list`);
  }
}
