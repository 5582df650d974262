export class BackportCheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An environment setting holds a value outside its accepted set. */
export class ConfigurationError extends BackportCheckError {}

/** A backport label name does not follow `<prefix>-<tag><major>.<minor>.x`. */
export class FormatError extends BackportCheckError {}

/** A backport label's description does not name its branch. */
export class DescriptionMismatchError extends BackportCheckError {}

/** A branch, label or milestone could not be found on the repository. */
export class LookupError extends BackportCheckError {}

/** The pull request's labels or milestone break the backport policy. */
export class PolicyViolation extends BackportCheckError {}
