/**
 * Conversion of AWS `Key`/`Value` tag lists
 */

/**
 * Tag as most AWS services return it
 *
 * @public
 */
export interface AwsTag {
  Key?: string | undefined;
  Value?: string | undefined;
}

/**
 * Collapse a tag list into a record; a tag without value maps to ""
 *
 * @public
 */
export function tagListToRecord(tags: readonly AwsTag[] | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      record[tag.Key] = tag.Value ?? "";
    }
  }
  return record;
}
