import { NoObservationsError } from '../errors';
import type { TaskResult } from '../types';
import type { Observation, ObservationType } from '../types/observations';

export function isObservationOf<T extends Observation>(observation: Observation, type: ObservationType<T>): observation is T {
  return observation instanceof type;
}

/**
 * Every observation of `type`, in result order. Observations of other types
 * are dropped; an empty list is a valid answer.
 */
export function asMany<T extends Observation>(result: TaskResult, type: ObservationType<T>): T[] {
  if (result.error) throw result.error;
  return result.observations.filter((observation): observation is T => isObservationOf(observation, type));
}

/** The first observation, which must be of `type`. */
export function asOne<T extends Observation>(result: TaskResult, type: ObservationType<T>): T {
  if (result.error) throw result.error;
  const [first] = result.observations;
  if (first === undefined || !isObservationOf(first, type)) {
    throw new NoObservationsError(
      first === undefined
        ? `${result.request.name} produced no observations`
        : `${result.request.name} produced ${first.constructor.name}, expected ${type.name}`,
    );
  }
  return first;
}
