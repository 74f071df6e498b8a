/**
 * Trigger Event domain model and trigger policy.
 *
 * A Trigger Event exists only for the duration of one pipeline run. Which
 * stages it unlocks is decided by pure predicates over its ref, kept apart
 * from the orchestrator so trigger policy can be tested on its own.
 */

/** Repository activity that can start a pipeline run. */
export type TriggerEventType = 'push-to-branch' | 'push-to-tag';

export interface TriggerEvent {
  eventType: TriggerEventType;
  /** Fully qualified (`refs/tags/v1.0`) or short (`v1.0`) ref. */
  ref: string;
}

/** Branch and tag filters that decide whether a push starts a run at all. */
export interface TriggerFilters {
  branches: string[];
  tags: string[];
}

export const BRANCH_REF_PREFIX = 'refs/heads/';
export const TAG_REF_PREFIX = 'refs/tags/';

/** Tags that publish a release unless the pipeline definition says otherwise. */
export const DEFAULT_TAG_PATTERNS: readonly string[] = ['v*'];

export const DEFAULT_TRIGGER_FILTERS: TriggerFilters = {
  branches: ['main'],
  tags: ['v*'],
};

export interface ParsedRef {
  kind: 'branch' | 'tag' | 'other';
  /** Ref with its `refs/heads/` or `refs/tags/` prefix removed. */
  name: string;
}

/** Split a fully qualified ref into its kind and short name. */
export function parseRef(ref: string): ParsedRef {
  if (ref.startsWith(BRANCH_REF_PREFIX)) {
    return { kind: 'branch', name: ref.slice(BRANCH_REF_PREFIX.length) };
  }
  if (ref.startsWith(TAG_REF_PREFIX)) {
    return { kind: 'tag', name: ref.slice(TAG_REF_PREFIX.length) };
  }
  return { kind: 'other', name: ref };
}

/** Qualify a short ref using the event type. Fully qualified refs pass through. */
export function normalizeTrigger(event: TriggerEvent): TriggerEvent {
  const ref = event.ref.trim();
  if (ref.startsWith('refs/')) {
    return { eventType: event.eventType, ref };
  }
  const prefix = event.eventType === 'push-to-tag' ? TAG_REF_PREFIX : BRANCH_REF_PREFIX;
  return { eventType: event.eventType, ref: `${prefix}${ref}` };
}

/**
 * Convert a ref glob into a RegExp. `*` matches within one path segment,
 * `**` across segments, `?` a single character.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        source += '.*';
        i++;
      } else {
        source += '[^/]*';
      }
    } else if (ch === '?') {
      source += '[^/]';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

/** Whether a short ref name matches any of the given globs. */
export function matchesAnyPattern(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => globToRegExp(pattern).test(name));
}

/**
 * Whether a ref should publish a release.
 *
 * Tag refs match on their tag name; branch and other qualified refs never
 * release. A short ref (`v1.2.0`, `main`) is matched as a tag name.
 */
export function isReleaseTrigger(ref: string, tagPatterns: readonly string[] = DEFAULT_TAG_PATTERNS): boolean {
  const trimmed = ref.trim();
  if (trimmed.length === 0) return false;
  const parsed = parseRef(trimmed);
  if (parsed.kind === 'branch') return false;
  if (parsed.kind === 'other' && trimmed.startsWith('refs/')) return false;
  return parsed.name.length > 0 && matchesAnyPattern(parsed.name, tagPatterns);
}

/** The release tag carried by a ref (`refs/tags/v1.0` → `v1.0`). */
export function tagFromRef(ref: string): string {
  return parseRef(ref).name;
}

/** Whether a push event passes the definition's branch/tag filters. */
export function matchesTriggerFilters(event: TriggerEvent, filters: TriggerFilters): boolean {
  const parsed = parseRef(normalizeTrigger(event).ref);
  if (parsed.kind === 'branch') {
    return event.eventType === 'push-to-branch' && matchesAnyPattern(parsed.name, filters.branches);
  }
  if (parsed.kind === 'tag') {
    return event.eventType === 'push-to-tag' && matchesAnyPattern(parsed.name, filters.tags);
  }
  return false;
}

/**
 * Build a Trigger Event from a repository push notification
 * (`{ ref: "refs/tags/v1.0" }`). Returns null for refs that are neither
 * branches nor tags.
 */
export function triggerFromPushRef(ref: string): TriggerEvent | null {
  const parsed = parseRef(ref);
  if (parsed.kind === 'branch') return { eventType: 'push-to-branch', ref };
  if (parsed.kind === 'tag') return { eventType: 'push-to-tag', ref };
  return null;
}

/** Map the CLI's `--event` value onto an event type. */
export function parseEventType(value: string): TriggerEventType | null {
  switch (value) {
    case 'push':
    case 'push-to-branch':
      return 'push-to-branch';
    case 'tag':
    case 'push-to-tag':
      return 'push-to-tag';
    default:
      return null;
  }
}
