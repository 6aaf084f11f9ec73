import { forbidden, notFound } from '../utils/errors.js';

/**
 * Every ownership and visibility decision goes through this module. It is
 * pure: callers load the entity and pass it in, and either get it back or
 * an AppError.
 */

/** The caller: an authenticated user, or null for anonymous token holders. */
export type Subject = { id: string } | null;

/** The slice of a file or bundle row that access decisions look at. */
export interface OwnedResource {
  userId: string;
  isPublic: boolean;
}

/**
 * `read` covers metadata, inline content, downloads and bundle member
 * listings. `mutate` covers rename, delete, visibility toggles and bundle
 * edits.
 */
export type AccessAction = 'read' | 'mutate';

export const SHARED_ITEM_NOT_FOUND = 'Shared item not found';

function isOwner(subject: Subject, resource: OwnedResource): boolean {
  return subject !== null && subject.id === resource.userId;
}

/**
 * Read: absent → NOT_FOUND, then public → allow, then owner → allow,
 * otherwise FORBIDDEN.
 * Mutate: owner only. An absent entity is FORBIDDEN as well, so id-based
 * mutation paths do not reveal which ids exist.
 */
export function authorize<T extends OwnedResource>(
  subject: Subject,
  resource: T | null | undefined,
  action: AccessAction,
): T {
  if (action === 'read') {
    if (!resource) {
      throw notFound(SHARED_ITEM_NOT_FOUND);
    }
    if (resource.isPublic || isOwner(subject, resource)) {
      return resource;
    }
    throw forbidden();
  }

  if (resource && isOwner(subject, resource)) {
    return resource;
  }
  throw forbidden();
}

export function canRead(subject: Subject, resource: OwnedResource | null | undefined): boolean {
  return !!resource && (resource.isPublic || isOwner(subject, resource));
}

/**
 * A file opened through a bundle link is shown in that bundle's context only
 * when the caller may read the bundle and the file really is a member.
 * Anything else quietly yields no context.
 */
export function resolveBundleContext<B extends OwnedResource>(
  fileId: string,
  bundle: B | null | undefined,
  memberFileIds: readonly string[],
  subject: Subject,
): B | null {
  if (!bundle || !canRead(subject, bundle)) {
    return null;
  }
  return memberFileIds.includes(fileId) ? bundle : null;
}
