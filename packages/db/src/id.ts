import KSUID from "ksuid";

/** Row kinds with generated ids. People keep their account codes ("1001"). */
export type IdTag =
  | "post"
  | "allocation"
  | "swap"
  | "swap_debt"
  | "unavailability"
  | "temp_role";

/**
 * `allocation_2NxX…`. KSUIDs start with a timestamp, so ids of one kind sort
 * roughly by creation time.
 */
export function generateId(tag: IdTag): string {
  return `${tag}_${KSUID.randomSync().string}`;
}
