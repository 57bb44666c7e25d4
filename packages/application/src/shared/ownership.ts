/** Owning user of a record; null for records created without one or with a blank user id */
export type Owner = string | null;

export interface RequestContext {
  /** Acting user, when known */
  readonly userId?: string | null | undefined;
}

export function ownerOf(context: RequestContext): Owner {
  return context.userId || null;
}

export function isOwnedBy(record: { readonly userId: Owner }, userId: string): boolean {
  return record.userId === userId;
}
