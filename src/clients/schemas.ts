import { jot, type InferJot } from '../jot.js';

const paginationNode = jot.object({
  index: jot.integer(),
  pageSize: jot.integer(),
  resultCount: jot.integer(),
  totalCount: jot.optional(jot.integer()),
});

const modNode = jot.object({
  id: jot.integer(),
  name: jot.string(),
  slug: jot.optional(jot.string()),
  links: jot.object({
    websiteUrl: jot.string({ nonEmpty: true }),
  }),
});

export type RawMod = InferJot<typeof modNode>;

const fileNode = jot.object({
  id: jot.integer(),
  modId: jot.integer(),
  displayName: jot.string(),
  fileName: jot.string({ nonEmpty: true }),
  fileDate: jot.string(),
  releaseType: jot.enum([1, 2, 3] as const),
  downloadUrl: jot.nullable(jot.string()),
  gameVersions: jot.array(jot.string()),
  dependencies: jot.array(
    jot.object({
      modId: jot.integer(),
      relationType: jot.integer(),
    }),
  ),
});

export type RawFile = InferJot<typeof fileNode>;

export const modResponse = jot.object({ data: modNode });

export const fileResponse = jot.object({ data: fileNode });

/** Pagination is optional here so a missing block can be reported by the caller. */
export const filePageResponse = jot.object({
  data: jot.array(fileNode),
  pagination: jot.optional(paginationNode),
});

export const searchResponse = jot.object({
  data: jot.array(modNode),
  pagination: jot.optional(paginationNode),
});
