/**
 * Name heuristics used by the detectors.
 *
 * These are deliberately approximate: a class called `UserCache` counts as
 * both a data model and a shared resource.
 */

const DATA_MODEL_WORDS = [
  'user', 'product', 'order', 'customer', 'item', 'model',
  'entity', 'record', 'data', 'person', 'account', 'invoice',
];

const SHARED_RESOURCE_WORDS = [
  'database', 'connection', 'config', 'settings', 'logger',
  'cache', 'registry', 'manager', 'service', 'client',
];

const CREATION_WORDS = ['create', 'factory'];

const COMMAND_WORDS = new Set(['execute', 'run', 'perform', 'do']);

const REPOSITORY_WORDS = new Set(['repository', 'repo', 'dao', 'store']);

const OBSERVER_COLLECTION_WORDS = ['observer', 'listener', 'subscriber', 'notification'];

/** Single instance fields recognised on a singleton class. */
export const INSTANCE_FIELD_NAMES: ReadonlySet<string> = new Set([
  '_instance',
  '__instance',
  '_singleton_instance',
]);

function containsAny(name: string, words: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return words.some((word) => lower.includes(word));
}

/**
 * Split an identifier into lowercase words on underscores and case changes.
 * `runBatchJob` -> run, batch, job; `UserDAO` -> user, dao.
 */
export function splitIdentifier(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .split(/[\s_]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.toLowerCase());
}

export function isDataModelName(name: string): boolean {
  return containsAny(name, DATA_MODEL_WORDS);
}

export function isSharedResourceName(name: string): boolean {
  return containsAny(name, SHARED_RESOURCE_WORDS);
}

export function isCreationName(name: string): boolean {
  return containsAny(name, CREATION_WORDS);
}

/**
 * Whole-word match, so `undo_last` and `document` are not commands.
 */
export function isCommandName(name: string): boolean {
  return splitIdentifier(name).some((word) => COMMAND_WORDS.has(word));
}

/**
 * Whole-word match, so `ReportBuilder` is not a repository.
 */
export function isRepositoryName(name: string): boolean {
  return splitIdentifier(name).some((word) => REPOSITORY_WORDS.has(word));
}

export function isObserverCollectionName(name: string): boolean {
  return containsAny(name, OBSERVER_COLLECTION_WORDS);
}

export function isNotificationMethodName(name: string): boolean {
  const lower = name.toLowerCase();
  return (
    lower.includes('update') ||
    lower.includes('notify') ||
    lower.startsWith('on_') ||
    lower.startsWith('handle')
  );
}
