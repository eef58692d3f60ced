import { z } from "zod";

// Non-string values count as absent.
const optionalText = z.string().optional().catch(undefined);

/**
 * Fields read from a Gatsby content node. Everything else on the node is
 * ignored; a missing field falls through to the next candidate.
 *
 * - title, then name: listing title
 * - url, then slug: link, possibly site-relative
 * - date, then startDate: day of the session
 */
export const gatsbyNodeSchema = z.object({
  title: optionalText,
  name: optionalText,
  url: optionalText,
  slug: optionalText,
  date: optionalText,
  startDate: optionalText,
});

export type GatsbyNode = z.infer<typeof gatsbyNodeSchema>;

const rawNodeSchema = z.record(z.string(), z.unknown()).catch({});

const edgeSchema = z
  .object({ node: rawNodeSchema })
  .catch({ node: {} });

/** A GraphQL connection, as Gatsby stores query results. */
export const connectionSchema = z.object({
  edges: z.array(edgeSchema),
});

/** The `page-data.json` envelope; anything unexpected collapses to no data. */
export const pageDataSchema = z
  .object({
    result: z
      .object({
        data: z.record(z.string(), z.unknown()).catch({}),
      })
      .catch({ data: {} }),
  })
  .catch({ result: { data: {} } });
