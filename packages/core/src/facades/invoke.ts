import { DomainServiceError, ValidationError } from "../errors.ts";
import type { DomainServiceName, FacadeResult } from "./types.ts";

/**
 * Runs one facade call and unwraps its result. `invalid_input` becomes a
 * ValidationError (the user is re-prompted); every other failure, thrown or returned,
 * becomes a DomainServiceError.
 */
export async function invokeFacade<T>(
  target: { service: DomainServiceName; operation: string; field?: string },
  call: () => Promise<FacadeResult<T>>,
): Promise<T> {
  let result: FacadeResult<T>;
  try {
    result = await call();
  } catch (error) {
    throw new DomainServiceError(`${target.service}.${target.operation} threw.`, {
      service: target.service,
      operation: target.operation,
      cause: error,
    });
  }

  if (result.ok) {
    return result.value;
  }

  if (result.error.kind === "invalid_input") {
    throw new ValidationError(result.error.message, { field: target.field ?? null });
  }

  throw new DomainServiceError(
    `${target.service}.${target.operation} ${result.error.kind}: ${result.error.message}`,
    { service: target.service, operation: target.operation },
  );
}
