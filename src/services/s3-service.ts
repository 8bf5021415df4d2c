/**
 * @module s3-service
 * S3 bucket discovery and removal
 *
 * Buckets are listed per region. A bucket's dependents are batches of object
 * versions and delete markers, one per `ListObjectVersions` page, each removed
 * with a single `DeleteObjects` call. Unversioned buckets report their objects
 * with the `null` version id, so the same path empties both.
 */

import {
  DeleteBucketCommand,
  DeleteObjectsCommand,
  ListBucketsCommand,
  ListObjectVersionsCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { z } from "zod";
import { decodePageToken, encodePageToken, parseArn } from "../lib/arn.js";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import { DeleteConflictError } from "../lib/sweep-errors.js";
import type { ListPageRequest, ResourcePage } from "../sweep/adapter.js";
import {
  createResource,
  type ObjectVersionRef,
  type ResourceNode,
  type Scope,
} from "../sweep/resource.js";
import type { AwsKindHandlers } from "./handler-types.js";

/**
 * Configuration options for S3 service
 *
 * @public
 */
export type S3ServiceOptions = BaseServiceOptions;

const VersionPageTokenSchema = z.object({
  page: z.number().int().positive(),
  keyMarker: z.string().optional(),
  versionIdMarker: z.string().optional(),
});

/**
 * Maximum keys per `DeleteObjects` request
 */
const DELETE_OBJECTS_LIMIT = 1000;

/**
 * S3 bucket discovery and removal
 *
 * @public
 */
export class S3Service extends BaseAwsService<S3Client> {
  constructor(options: S3ServiceOptions = {}) {
    super((config) => new S3Client(config), options);
  }

  /**
   * Kind handlers for the provider adapter
   */
  handlers(): AwsKindHandlers<"Bucket" | "S3ObjectVersionBatch"> {
    return {
      Bucket: {
        listPage: (request) => this.listBuckets(request),
        deleteOne: (bucket) => this.deleteBucket(bucket),
        taggingResourceType: "s3:bucket",
        fromArn: (arn, tags, scope) => this.bucketFromArn(arn, tags, scope),
      },
      S3ObjectVersionBatch: {
        listPage: (request) => this.listObjectVersionBatches(request),
        deleteOne: (batch) => this.deleteObjectVersionBatch(batch),
      },
    };
  }

  /**
   * List one page of buckets located in the scope's region
   */
  async listBuckets(request: ListPageRequest): Promise<ResourcePage> {
    const { scope } = request;
    const response = await this.call("s3:ListBuckets", scope, (client) =>
      client.send(
        new ListBucketsCommand({
          BucketRegion: scope.region,
          MaxBuckets: 1000,
          ...(request.pageToken && { ContinuationToken: request.pageToken }),
        }),
      ),
    );

    const resources = (response.Buckets ?? []).flatMap((bucket) =>
      bucket.Name
        ? [
            createResource("Bucket", {
              id: bucket.Name,
              arn: `arn:aws:s3:::${bucket.Name}`,
              scope,
              meta: { ...(bucket.CreationDate && { creationDate: bucket.CreationDate.toISOString() }) },
            }),
          ]
        : [],
    );

    return {
      resources,
      ...(response.ContinuationToken && { nextPageToken: response.ContinuationToken }),
    };
  }

  /**
   * List one page of object versions and delete markers of the parent bucket
   * as a single batch resource
   */
  async listObjectVersionBatches(request: ListPageRequest): Promise<ResourcePage> {
    const { parent, scope } = request;
    if (parent?.kind !== "Bucket") {
      return { resources: [] };
    }

    const state = decodePageToken(request.pageToken, VersionPageTokenSchema);
    const page = state?.page ?? 1;

    const response = await this.call(
      "s3:ListObjectVersions",
      scope,
      (client) =>
        client.send(
          new ListObjectVersionsCommand({
            Bucket: parent.id,
            MaxKeys: DELETE_OBJECTS_LIMIT,
            ...(state?.keyMarker && { KeyMarker: state.keyMarker }),
            ...(state?.versionIdMarker && { VersionIdMarker: state.versionIdMarker }),
          }),
        ),
      parent.id,
    );

    const objects: ObjectVersionRef[] = [
      ...(response.Versions ?? []),
      ...(response.DeleteMarkers ?? []),
    ].flatMap((entry) =>
      entry.Key ? [{ key: entry.Key, ...(entry.VersionId && { versionId: entry.VersionId }) }] : [],
    );

    const resources =
      objects.length > 0
        ? [
            createResource("S3ObjectVersionBatch", {
              id: `${parent.id}#${page}`,
              name: `${parent.id} object versions page ${page} (${objects.length})`,
              scope,
              meta: { bucket: parent.id, objects },
            }),
          ]
        : [];

    const nextPageToken = response.IsTruncated
      ? encodePageToken({
          page: page + 1,
          ...(response.NextKeyMarker && { keyMarker: response.NextKeyMarker }),
          ...(response.NextVersionIdMarker && { versionIdMarker: response.NextVersionIdMarker }),
        })
      : undefined;

    return { resources, ...(nextPageToken && { nextPageToken }) };
  }

  /**
   * Delete every object version in a batch with one request
   *
   * @throws {@link DeleteConflictError} when S3 reports per-key failures
   */
  async deleteObjectVersionBatch(batch: ResourceNode<"S3ObjectVersionBatch">): Promise<void> {
    const { bucket, objects } = batch.meta;

    const response = await this.call(
      "s3:DeleteObjects",
      batch.scope,
      (client) =>
        client.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: {
              Objects: objects.map((object) => ({
                Key: object.key,
                ...(object.versionId && { VersionId: object.versionId }),
              })),
              Quiet: true,
            },
          }),
        ),
      batch.id,
    );

    const errors = response.Errors ?? [];
    const [first] = errors;
    if (first) {
      throw new DeleteConflictError(
        `${errors.length} of ${objects.length} object versions in ${bucket} could not be deleted (${first.Code ?? "UnknownError"}: ${first.Message ?? "no message"})`,
        batch.id,
      );
    }
  }

  /**
   * Delete an (empty) bucket
   */
  async deleteBucket(bucket: ResourceNode<"Bucket">): Promise<void> {
    await this.call(
      "s3:DeleteBucket",
      bucket.scope,
      (client) => client.send(new DeleteBucketCommand({ Bucket: bucket.id })),
      bucket.id,
    );
  }

  private bucketFromArn(
    arn: string,
    tags: Record<string, string>,
    scope: Scope,
  ): ResourceNode<"Bucket"> | undefined {
    const name = parseArn(arn)?.resource;
    return name ? createResource("Bucket", { id: name, arn, scope, tags, meta: {} }) : undefined;
  }
}
