import {
  DEFAULT_LABEL_PREFIX,
  DEFAULT_NO_BACKPORT_LABEL,
  DEFAULT_TAG_PREFIX,
} from './constants';
import { CheckBackportLabels, SetMilestone } from './enums';
import { BackportSettings } from './interfaces';
import { getEnumEnvVar, getEnvVar } from './utils/env-util';

/**
 * Reads the checker's settings from the process environment.
 *
 * Every value is lower-cased. Unset variables fall back to their defaults,
 * which leave both the label check and milestone assignment disabled.
 */
export const getSettings = (): BackportSettings => {
  const checkBackportLabels = getEnumEnvVar(
    'CHECK_BACKPORT_LABELS',
    Object.values(CheckBackportLabels),
    CheckBackportLabels.DEFAULT,
  );
  const setMilestone = getEnumEnvVar(
    'SET_MILESTONE',
    Object.values(SetMilestone),
    SetMilestone.DEFAULT,
  );

  return Object.freeze({
    checkBackportLabels,
    setMilestone,
    noBackportLabel: getEnvVar(
      'NO_BACKPORT',
      DEFAULT_NO_BACKPORT_LABEL,
    ).toLowerCase(),
    tagPrefix: getEnvVar('TAG_PREFIX', DEFAULT_TAG_PREFIX).toLowerCase(),
    labelPrefix: getEnvVar('LABEL_PREFIX', DEFAULT_LABEL_PREFIX).toLowerCase(),
    runCheck: checkBackportLabels === CheckBackportLabels.TRUE,
    runMilestone:
      setMilestone === SetMilestone.TRUE ||
      setMilestone === SetMilestone.OVERWRITE,
    overwrite: setMilestone === SetMilestone.OVERWRITE,
  });
};
