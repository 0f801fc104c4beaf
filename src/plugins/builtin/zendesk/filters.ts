import { EventIgnoredError } from '../../../errors/index.js';
import { asString, asStringArray, splitCsv } from '../../sdk/values.js';

type Ticket = Record<string, unknown>;

// Matches when the ticket has no value for the field.
function oneOf(value: unknown, allowed: unknown): boolean {
  const options = splitCsv(allowed, { lowercase: true });
  if (options.length === 0) return true;
  const current = asString(value);
  if (!current) return true;
  return options.includes(current.toLowerCase());
}

// Fails when the ticket has no value for the field.
function idIn(value: unknown, allowed: unknown): boolean {
  const ids = splitCsv(allowed);
  if (ids.length === 0) return true;
  const current = asString(value);
  return current !== undefined && ids.includes(current);
}

export function containsAny(text: unknown, keywords: unknown): boolean {
  const words = splitCsv(keywords, { lowercase: true });
  if (words.length === 0) return true;
  if (typeof text !== 'string' || !text) return false;
  const haystack = text.toLowerCase();
  return words.some((word) => haystack.includes(word));
}

function hasAllTags(ticket: Ticket, required: unknown): boolean {
  const tags = splitCsv(required, { lowercase: true });
  if (tags.length === 0) return true;
  if (!Array.isArray(ticket.tags)) return false;
  const present = asStringArray(ticket.tags).map((tag) => tag.toLowerCase());
  return tags.every((tag) => present.includes(tag));
}

/**
 * Apply the ticket filter parameters, throwing EventIgnoredError on the first miss.
 */
export function checkTicketFilters(ticket: Ticket, parameters: Record<string, unknown>): void {
  const checks: Array<[string, boolean]> = [
    ['status', oneOf(ticket.status, parameters.status)],
    ['priority', oneOf(ticket.priority, parameters.priority)],
    ['type', oneOf(ticket.type, parameters.type)],
    ['tags', hasAllTags(ticket, parameters.tags)],
    ['subject_contains', containsAny(ticket.subject, parameters.subject_contains)],
    ['description_contains', containsAny(ticket.description, parameters.description_contains)],
    ['assignee', idIn(ticket.assignee_id, parameters.assignee)],
    ['group', idIn(ticket.group_id, parameters.group)],
    ['requester', idIn(ticket.requester_id, parameters.requester)],
  ];

  const failed = checks.find(([, passed]) => !passed);
  if (failed) {
    throw new EventIgnoredError(`Ticket does not match ${failed[0]} filter`);
  }
}

/**
 * from/to filters on a change event; the compared values are lower-cased.
 */
export function checkTransition(
  previous: string,
  current: string,
  fromFilter: unknown,
  toFilter: unknown
): void {
  const from = splitCsv(fromFilter, { lowercase: true });
  if (from.length > 0 && !from.includes(previous)) {
    throw new EventIgnoredError(`Previous value ${previous} is filtered out`);
  }
  const to = splitCsv(toFilter, { lowercase: true });
  if (to.length > 0 && !to.includes(current)) {
    throw new EventIgnoredError(`New value ${current} is filtered out`);
  }
}
