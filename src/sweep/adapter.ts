/**
 * @module adapter
 * Provider client adapter contract
 *
 * The engine talks to a provider only through {@link ProviderClientAdapter}.
 * Implementations hide pagination details behind opaque page tokens and
 * raise only the errors from `sweep-errors.ts`:
 *
 * - `listPage`: `ProviderUnavailableError`, `ProviderThrottledError`
 * - `deleteOne`: additionally `DeleteConflictError`, `DeleteNotFoundError`
 *
 * @public
 */

import type { TagFilter } from "./filter.js";
import type { Resource, ResourceKind, ResourceNode, Scope } from "./resource.js";

/**
 * Request for one page of resources
 *
 * @public
 */
export interface ListPageRequest {
  kind: ResourceKind;
  scope: Scope;
  /** Token returned by the previous page; absent for the first page */
  pageToken?: string;
  /** Owner whose dependents are being listed */
  parent?: Resource;
  /** Present when the filter needs tags; adapters must populate `tags` */
  tagFilter?: TagFilter;
}

/**
 * One page of resources
 *
 * @public
 */
export interface ResourcePage {
  resources: Resource[];
  /** Absent on the last page */
  nextPageToken?: string;
}

/**
 * Uniform listing and deletion over every resource kind
 *
 * @public
 */
export interface ProviderClientAdapter {
  listPage(request: ListPageRequest): Promise<ResourcePage>;
  deleteOne(resource: Resource): Promise<void>;
}

/**
 * Listing and deletion for a single kind
 *
 * @public
 */
export interface KindHandler<K extends ResourceKind> {
  listPage(request: ListPageRequest): Promise<ResourcePage>;
  deleteOne(resource: ResourceNode<K>): Promise<void>;
}
