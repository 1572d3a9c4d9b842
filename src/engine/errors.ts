export type RobotErrorKind =
  | 'NotFound'
  | 'InvalidArgument'
  | 'InsufficientEnergy'
  | 'IncapacitatedActor'
  | 'Conflict'
  | 'NotHeld';

/**
 * Failure of a single registry operation. Raised before any mutation, so the
 * robot state and action log are unchanged when one of these is thrown.
 */
export class RobotError extends Error {
  readonly kind: RobotErrorKind;

  constructor(kind: RobotErrorKind, message: string) {
    super(message);
    this.name = 'RobotError';
    this.kind = kind;
  }
}

export function isRobotError(err: unknown, kind?: RobotErrorKind): err is RobotError {
  return err instanceof RobotError && (kind === undefined || err.kind === kind);
}

export const notFound = (robotId: string) =>
  new RobotError('NotFound', `Robot "${robotId}" not found`);

export const invalidArgument = (message: string) => new RobotError('InvalidArgument', message);
