/**
 * Topology input: schema validation and JSON file loading
 *
 * File format:
 *   { "routers": ["a", "b"], "links": [{ "from": "a", "to": "b", "cost": 1 }] }
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { TopologyError } from '../core/errors.js';
import type { Topology } from '../core/routing/types.js';

const routerIdSchema = z.string().min(1, { message: 'Router id must not be empty' });

const linkSchema = z.object({
  from: routerIdSchema,
  to: routerIdSchema,
  cost: z
    .number({ invalid_type_error: 'Link cost is expected to be a number.' })
    .finite()
    .nonnegative({ message: 'Link cost must be nonnegative' }),
});

export const topologySchema = z
  .object({
    routers: z.array(routerIdSchema),
    links: z.array(linkSchema),
  })
  .superRefine((topology, ctx) => {
    const routers = new Set<string>();
    topology.routers.forEach((id, index) => {
      if (routers.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['routers', index],
          message: `Duplicate router ${id}`,
        });
      }
      routers.add(id);
    });

    const seen = new Set<string>();
    topology.links.forEach((link, index) => {
      const path = ['links', index];
      for (const end of [link.from, link.to]) {
        if (!routers.has(end)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path,
            message: `Link references unknown router ${end}`,
          });
        }
      }
      if (link.from === link.to) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path,
          message: `Self link on router ${link.from}`,
        });
      }

      const key = [link.from, link.to].sort().join('\u0000');
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path,
          message: `Duplicate link ${link.from} - ${link.to}`,
        });
      }
      seen.add(key);
    });
  });

/**
 * Validate untrusted data as a topology
 */
export function parseTopology(data: unknown): Topology {
  const result = topologySchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new TopologyError('Invalid topology', issues);
  }
  return result.data;
}

export async function loadTopologyFile(path: string): Promise<Topology> {
  const text = await readFile(path, 'utf8');

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TopologyError(`Topology file ${path} is not valid JSON`, [reason]);
  }

  return parseTopology(data);
}
