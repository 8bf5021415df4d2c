/**
 * @module filter
 * Candidate filters for discovery
 *
 * A filter is plain data, compiled once into a predicate and evaluated once per
 * discovered resource. Several user options combine into an `all` filter.
 *
 * @public
 */

import type { Resource } from "./resource.js";

/**
 * Required tags: each key must be present with one of the listed values.
 * An empty value list accepts any value.
 *
 * @public
 */
export type TagFilter = Readonly<Record<string, readonly string[]>>;

/**
 * Filter supplied by the caller
 *
 * @public
 */
export type Filter =
  | { readonly type: "name-glob"; readonly pattern: string }
  | { readonly type: "tags"; readonly tags: TagFilter }
  | { readonly type: "ids"; readonly ids: readonly string[] }
  | { readonly type: "all"; readonly filters: readonly Filter[] };

/**
 * Compiled filter
 *
 * @public
 */
export type ResourcePredicate = (resource: Resource) => boolean;

/**
 * Translate a shell-style glob into an anchored regular expression
 *
 * `*` matches any run of characters and `?` exactly one; everything else,
 * including `[`, is literal.
 *
 * @param pattern - Glob such as `a-*` or `build-??`
 * @returns Anchored expression matching the whole name
 *
 * @public
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (const character of pattern) {
    if (character === "*") {
      source += ".*";
    } else if (character === "?") {
      source += ".";
    } else {
      source += character.replaceAll(/[$()+.[\\\]^{|}]/g, String.raw`\$&`);
    }
  }
  return new RegExp(`^${source}$`, "s");
}

function matchesTags(resource: Resource, tags: TagFilter): boolean {
  return Object.entries(tags).every(([key, values]) => {
    const actual = resource.tags[key];
    if (actual === undefined) {
      return false;
    }
    return values.length === 0 || values.includes(actual);
  });
}

/**
 * Compile a filter into a predicate
 *
 * @param filter - Filter to compile
 * @returns Predicate over discovered resources
 *
 * @public
 */
export function compileFilter(filter: Filter): ResourcePredicate {
  switch (filter.type) {
    case "name-glob": {
      const expression = globToRegExp(filter.pattern);
      return (resource) => expression.test(resource.name);
    }
    case "tags": {
      return (resource) => matchesTags(resource, filter.tags);
    }
    case "ids": {
      const ids = new Set(filter.ids);
      return (resource) =>
        ids.has(resource.id) ||
        ids.has(resource.name) ||
        (resource.arn !== undefined && ids.has(resource.arn));
    }
    case "all": {
      const predicates = filter.filters.map((inner) => compileFilter(inner));
      return (resource) => predicates.every((predicate) => predicate(resource));
    }
  }
}

/**
 * Collect the tag requirements of a filter so the adapter can fetch tags
 *
 * @param filter - Filter to inspect
 * @returns Merged tag filter, or undefined when no tags are involved
 *
 * @public
 */
export function extractTagFilter(filter: Filter): TagFilter | undefined {
  switch (filter.type) {
    case "tags": {
      return filter.tags;
    }
    case "all": {
      const merged: Record<string, readonly string[]> = {};
      let found = false;
      for (const inner of filter.filters) {
        const tags = extractTagFilter(inner);
        if (tags) {
          found = true;
          Object.assign(merged, tags);
        }
      }
      return found ? merged : undefined;
    }
    default: {
      return undefined;
    }
  }
}

/**
 * Combine several filters, collapsing the single-filter case
 *
 * @returns The combined filter, or undefined when none was given
 *
 * @public
 */
export function combineFilters(filters: readonly Filter[]): Filter | undefined {
  if (filters.length === 0) {
    return undefined;
  }
  if (filters.length === 1) {
    return filters[0];
  }
  return { type: "all", filters };
}

/**
 * Describe a filter for confirmation prompts and logs
 *
 * @public
 */
export function describeFilter(filter: Filter): string {
  switch (filter.type) {
    case "name-glob": {
      return `name matches '${filter.pattern}'`;
    }
    case "tags": {
      return Object.entries(filter.tags)
        .map(([key, values]) => (values.length === 0 ? `tag ${key}` : `tag ${key}=${values.join("|")}`))
        .join(" and ");
    }
    case "ids": {
      return filter.ids.length === 1 ? `id ${filter.ids[0]}` : `${filter.ids.length} listed ids`;
    }
    case "all": {
      return filter.filters.map((inner) => describeFilter(inner)).join(" and ");
    }
  }
}
