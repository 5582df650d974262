export const DEFAULT_NO_BACKPORT_LABEL = 'no-backport';

export const DEFAULT_TAG_PREFIX = '';

export const DEFAULT_LABEL_PREFIX = 'backport-';

export const LABEL_BRANCH_DELIMITER = '-';

export const BACKPORT_DESCRIPTION_PREFIX = 'on-merge: backport to ';

export const PULL_REQUEST_EVENTS: readonly string[] = [
  'pull_request',
  'pull_request_target',
];
