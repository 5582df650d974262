export enum LogLevel {
  LOG,
  INFO,
  WARN,
  ERROR,
}

// CHECK_BACKPORT_LABELS values
export enum CheckBackportLabels {
  DEFAULT = 'false',
  TRUE = 'true',
}

// SET_MILESTONE values
export enum SetMilestone {
  DEFAULT = 'false',
  TRUE = 'true',
  OVERWRITE = 'overwrite',
}
