import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { test } from '../testHarness';

type Violation = {
  file: string;
  specifier: string;
  reason: string;
};

type LayerRule = {
  layer: string;
  banned: string[];
};

const srcRoot = path.resolve(__dirname, '..', '..', 'src');

/** Device and codec libraries belong behind a port. */
const DEVICE_LIBRARIES = ['castv2-client', 'bonjour-service', 'music-metadata'];

const rules: LayerRule[] = [
  {
    layer: 'domain',
    banned: ['node:', '@/application', '@/adapters', '@/config', '@/infrastructure', '@/ports', '@/runtime', '@/shared'],
  },
  {
    layer: 'ports',
    banned: ['@/adapters', '@/application', '@/config', '@/infrastructure', '@/runtime', ...DEVICE_LIBRARIES],
  },
  {
    layer: 'shared',
    banned: ['@/adapters', '@/application', '@/config', '@/domain', '@/infrastructure', '@/ports', '@/runtime'],
  },
  {
    layer: 'application',
    banned: ['@/adapters', '@/config', '@/infrastructure', '@/runtime', ...DEVICE_LIBRARIES],
  },
  { layer: 'adapters', banned: ['@/runtime'] },
  { layer: 'infrastructure', banned: ['@/adapters', '@/application', '@/runtime'] },
];

const importPattern = /(?:import|export)\s+[^;]*?from\s+['"]([^'"]+)['"]|import\(\s*['"]([^'"]+)['"]\s*\)/g;

function listTsFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      return listTsFiles(fullPath);
    }
    return entry.isFile() && entry.name.endsWith('.ts') ? [fullPath] : [];
  });
}

function collectImports(content: string): string[] {
  return Array.from(content.matchAll(importPattern), (match) => match[1] ?? match[2] ?? '').filter(Boolean);
}

function importsOf(file: string): string[] {
  return collectImports(fs.readFileSync(file, 'utf8'));
}

test('layers only import what they are allowed to', () => {
  const violations: Violation[] = [];
  for (const { layer, banned } of rules) {
    for (const file of listTsFiles(path.join(srcRoot, layer))) {
      for (const specifier of importsOf(file)) {
        const hit = banned.find((prefix) => specifier === prefix || specifier.startsWith(prefix.endsWith(':') ? prefix : `${prefix}/`));
        if (hit) {
          violations.push({ file: path.relative(srcRoot, file), specifier, reason: `${layer} must not import ${hit}` });
        }
      }
    }
  }
  assert.deepEqual(violations, []);
});

test('sources reach other directories through the @/ alias', () => {
  const violations: Violation[] = [];
  for (const file of listTsFiles(srcRoot)) {
    for (const specifier of importsOf(file)) {
      if (specifier.startsWith('../')) {
        violations.push({ file: path.relative(srcRoot, file), specifier, reason: 'relative parent import' });
      }
    }
  }
  assert.deepEqual(violations, []);
});

test('import scanner sees static, re-exported and dynamic imports', () => {
  const source = [
    "import type { A } from '@/ports/TargetPort';",
    "export { B } from '@/shared/bestEffort';",
    "const c = import('castv2-client');",
  ].join('\n');
  assert.deepEqual(collectImports(source), ['@/ports/TargetPort', '@/shared/bestEffort', 'castv2-client']);
});
