export type LinkageErrorCode =
  | 'EMPTY_POINTS'
  | 'EMPTY_BODIES'
  | 'DUPLICATE_POINT_ID'
  | 'UNKNOWN_POINT_REFERENCE'
  | 'INVALID_SHOCK_BODY'
  | 'MISSING_SHOCK_STROKE'
  | 'MULTIPLE_SHOCK_BODIES'
  | 'MISSING_SHOCK_BODY';

/**
 * Base class for geometry that cannot be compiled into a solvable linkage.
 * @public
 */
export class LinkageValidationError extends Error {
  readonly code: LinkageErrorCode;
  readonly bodyId?: string;
  readonly pointId?: string;

  constructor(code: LinkageErrorCode, message: string, context: { bodyId?: string; pointId?: string } = {}) {
    super(message);
    this.name = 'LinkageValidationError';
    this.code = code;
    this.bodyId = context.bodyId;
    this.pointId = context.pointId;
  }
}

/** @public */
export class EmptyPointsError extends LinkageValidationError {
  constructor() {
    super('EMPTY_POINTS', 'No points defined for this bike.');
    this.name = 'EmptyPointsError';
  }
}

/** @public */
export class EmptyBodiesError extends LinkageValidationError {
  constructor() {
    super('EMPTY_BODIES', 'No rigid bodies defined for this bike.');
    this.name = 'EmptyBodiesError';
  }
}

/** @public */
export class DuplicatePointIdError extends LinkageValidationError {
  constructor(pointId: string) {
    super('DUPLICATE_POINT_ID', `Point id '${pointId}' is used more than once.`, { pointId });
    this.name = 'DuplicatePointIdError';
  }
}

/** @public */
export class UnknownPointReferenceError extends LinkageValidationError {
  constructor(bodyId: string, pointId: string) {
    super('UNKNOWN_POINT_REFERENCE', `Rigid body '${bodyId}' references unknown point '${pointId}'.`, {
      bodyId,
      pointId,
    });
    this.name = 'UnknownPointReferenceError';
  }
}

/** @public */
export class InvalidShockBodyError extends LinkageValidationError {
  constructor(bodyId: string, pointCount: number) {
    super('INVALID_SHOCK_BODY', `Shock body '${bodyId}' must connect exactly 2 points, got ${pointCount}.`, {
      bodyId,
    });
    this.name = 'InvalidShockBodyError';
  }
}

/** @public */
export class MissingShockStrokeError extends LinkageValidationError {
  constructor(bodyId: string) {
    super('MISSING_SHOCK_STROKE', `Shock body '${bodyId}' must define 'stroke'.`, { bodyId });
    this.name = 'MissingShockStrokeError';
  }
}

/** @public */
export class MultipleShockBodiesError extends LinkageValidationError {
  constructor(bodyId: string, firstBodyId: string) {
    super(
      'MULTIPLE_SHOCK_BODIES',
      `Shock body '${bodyId}' found after '${firstBodyId}'; only one driver is supported.`,
      { bodyId }
    );
    this.name = 'MultipleShockBodiesError';
  }
}

/** @public */
export class MissingShockBodyError extends LinkageValidationError {
  constructor() {
    super('MISSING_SHOCK_BODY', "No shock body found; need exactly one rigid body with type 'shock'.");
    this.name = 'MissingShockBodyError';
  }
}

/**
 * Step or iteration counts the solver cannot run with.
 * @public
 */
export class SolverOptionsError extends Error {
  readonly option: string;

  constructor(option: string, value: number) {
    super(`Solver option '${option}' must be an integer >= 1, got ${value}.`);
    this.name = 'SolverOptionsError';
    this.option = option;
  }
}

/** @public */
export class InvalidScaleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidScaleError';
  }
}
