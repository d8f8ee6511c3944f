/** Postgres renders uuids in lowercase; request ids may arrive in any case. */
export function isSameUuid(left: string | null | undefined, right: string | null | undefined): boolean {
  if (!left || !right) {
    return false;
  }

  return left.toLowerCase() === right.toLowerCase();
}
