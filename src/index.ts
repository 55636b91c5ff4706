export {
  DEFAULT_ITERATIONS,
  DEFAULT_STEPS,
  relaxLinkage,
  resolveSolverOptions,
  type LinkagePose,
  type SolverOptions,
} from './ConstraintSolver';
export {
  DuplicatePointIdError,
  EmptyBodiesError,
  EmptyPointsError,
  InvalidScaleError,
  InvalidShockBodyError,
  LinkageValidationError,
  MissingShockBodyError,
  MissingShockStrokeError,
  MultipleShockBodiesError,
  SolverOptionsError,
  UnknownPointReferenceError,
  type LinkageErrorCode,
} from './errors';
export { compileLinkage, type CompiledLinkage, type LinkEdge } from './LinkageBuilder';
export {
  LinkageDocumentError,
  linkageDocumentSchema,
  parseLinkageDocument,
  type LinkageDocument,
  type LinkageDocumentInput,
} from './LinkageDocument';
export { aggregateSteps, constraintResidual } from './ResultAggregator';
export { solveBikeLinkage } from './solveBikeLinkage';
export {
  BODY_TYPES,
  POINT_TYPES,
  type BikeGeometry,
  type BodyType,
  type LinkagePoint,
  type PointType,
  type Position,
  type RigidBody,
  type SolverResult,
  type SolverStep,
} from './types';
export {
  bodiesToPixels,
  lengthToMillimeters,
  resolveScale,
  resultToMillimeters,
  scaleFromRearCenter,
  strokeToPixels,
} from './Units';
