import { randomUUID } from "node:crypto";

/** Short correlation id for one dispatch, e.g. "inv-1f3a9c2e". */
export function generateInvocationId(): string {
  return `inv-${randomUUID().slice(0, 8)}`;
}
