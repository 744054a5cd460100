import { z } from 'zod';
import { UsageKey } from '../../fields/src/opaque-keys.js';
import { ResourceStore } from '../../loader/src/resource-store.js';
import { JsonValue } from '../../shared/src/json.js';
import { PolicyMapping } from './metadata-merger.js';

export interface PolicySource {
  getPolicy(usageId: UsageKey): PolicyMapping;
}

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema)
  ])
);

/**
 * Course policy document: `{ "<category>/<url_name>": { "<field>": <value>, ... } }`.
 */
export const PolicyDocumentSchema = z.record(
  z.string().regex(/^[^/]+\/.+$/, 'policy keys take the form <category>/<url_name>'),
  z.record(z.string(), JsonValueSchema)
);

export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;

export function policyKey(usageId: UsageKey): string {
  return `${usageId.blockType}/${usageId.blockId}`;
}

/**
 * Policy held in memory, keyed by `<category>/<url_name>`.
 */
export class StaticPolicySource implements PolicySource {
  private readonly entries: Map<string, PolicyMapping>;

  constructor(document: PolicyDocument = {}) {
    this.entries = new Map(Object.entries(document));
  }

  getPolicy(usageId: UsageKey): PolicyMapping {
    const policy = this.entries.get(policyKey(usageId));
    return policy ? structuredClone(policy) : {};
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Load a course `policy.json` from a resource store. A missing file means an empty policy;
 * a file that is not valid JSON or does not match the policy shape is an error.
 */
export function loadPolicyFile(store: ResourceStore, path: string): StaticPolicySource {
  if (!store.exists(path)) {
    return new StaticPolicySource();
  }

  let document: unknown;
  try {
    document = JSON.parse(store.readText(path));
  } catch (error) {
    throw new Error(`Policy file ${path} is not valid JSON`, { cause: error });
  }

  const parsed = PolicyDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Policy file ${path} is invalid: ${issues.join('; ')}`);
  }
  return new StaticPolicySource(parsed.data);
}
