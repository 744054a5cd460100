import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { loadOlxEnvironment, resolvePath } from '../config/olx.js';
import { CourseKey } from '../content-engine/fields/src/opaque-keys.js';
import { DiskResourceStore } from '../content-engine/loader/src/resource-store.js';
import { policyKey, loadPolicyFile } from '../content-engine/metadata/src/policy-source.js';
import { PolicyMapping } from '../content-engine/metadata/src/metadata-merger.js';
import { roundTripBlocks } from '../content-engine/olx/src/olx.js';
import { CourseIdGenerator } from '../content-engine/runtime/src/id-generator.js';
import { OlxRuntime } from '../content-engine/runtime/src/block-runtime.js';
import { XmlElement, createElement, serializeXml } from '../content-engine/xml/src/xml-tree.js';

const DEFAULT_POLICY_FILE = 'policy.json';

function listFiles(dir: string, relative = ''): string[] {
  const absolute = path.join(dir, relative);
  if (!fs.existsSync(absolute)) {
    return [];
  }
  return fs.readdirSync(absolute, { withFileTypes: true }).flatMap(entry => {
    const child = relative ? `${relative}/${entry.name}` : entry.name;
    return entry.isDirectory() ? listFiles(dir, child) : [child];
  });
}

/**
 * One pointer node per definition file under each registered category directory. A `.html`
 * file only counts when no `.xml` definition of the same name exists.
 */
function discoverPointers(sourceDir: string, categories: string[]): XmlElement[] {
  const pointers: XmlElement[] = [];
  for (const category of categories) {
    const files = listFiles(path.join(sourceDir, category));
    const definitions = new Set(files.filter(file => file.endsWith('.xml')).map(file => file.slice(0, -'.xml'.length)));
    const rawOnly = files
      .filter(file => file.endsWith('.html'))
      .map(file => file.slice(0, -'.html'.length))
      .filter(name => !definitions.has(name));

    for (const name of [...definitions, ...rawOnly].sort()) {
      pointers.push(createElement(category, { url_name: name.replace(/\//g, ':') }));
    }
  }
  return pointers;
}

function main(): void {
  const env = loadOlxEnvironment();
  const sourceDir = resolvePath(env.OLX_SOURCE_DIR);
  const exportDir = resolvePath(env.OLX_EXPORT_DIR);

  const resources = new DiskResourceStore(sourceDir);
  const exportResources = new DiskResourceStore(exportDir);
  const policy = loadPolicyFile(resources, env.OLX_POLICY_FILE ?? DEFAULT_POLICY_FILE);

  const runtime = new OlxRuntime({
    resources,
    exportResources,
    idGenerator: new CourseIdGenerator(CourseKey.parse(env.OLX_COURSE_KEY)),
    policy
  });

  const pointers = discoverPointers(sourceDir, runtime.registry.categories());
  console.log(`Importing ${pointers.length} blocks from ${sourceDir} (${policy.size} policy entries)`);

  const result = roundTripBlocks(pointers, runtime);
  if (!result.ok) {
    for (const error of result.errors) {
      console.error(`[${error.correlationId}] ${error.code}:`, error.data);
    }
    process.exitCode = 1;
    return;
  }

  const index = createElement('blocks');
  const exportedPolicy: Record<string, PolicyMapping> = {};
  for (const { block, exported } of result.value) {
    index.children.push(exported.node);
    if (Object.keys(exported.policy).length > 0) {
      exportedPolicy[policyKey(block.location)] = exported.policy;
    }
  }

  exportResources.writeText('index.xml', `${serializeXml(index)}\n`);
  exportResources.writeText(DEFAULT_POLICY_FILE, `${JSON.stringify(exportedPolicy, null, 2)}\n`);
  console.log(`✅ Exported ${result.value.length} blocks to ${exportDir}`);
}

try {
  main();
} catch (error) {
  console.error('❌ Round trip failed:', error);
  process.exitCode = 1;
}
