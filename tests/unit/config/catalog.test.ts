import { describe, it, expect, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadCapabilityCatalog } from '../../../src/config/catalog.js';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-test-'));

function writeCatalog(name: string, body: unknown): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, JSON.stringify(body));
  return file;
}

const entry = {
  name: 'alpha',
  provider: 'anthropic',
  modelId: 'model-a',
  supportedLanguages: ['python'],
  supportedTasks: ['code-generation'],
  maxComplexity: 3,
  maxTokens: 4000,
  costPerToken: 0.00001,
};

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('loadCapabilityCatalog', () => {
  it('loads the bundled catalog in file order', () => {
    const catalog = loadCapabilityCatalog(path.resolve('data/capability-catalog.json'));
    expect(catalog.map(e => e.name)).toEqual(['claude-sonnet-4-5', 'claude-haiku-4-5', 'minimax-m2.5']);
  });

  it('rejects duplicate names', () => {
    const file = writeCatalog('dupes.json', { providers: [entry, entry] });
    expect(() => loadCapabilityCatalog(file)).toThrow(`Duplicate provider "alpha" in ${file}`);
  });

  it('rejects an out-of-range complexity', () => {
    const file = writeCatalog('bad.json', { providers: [{ ...entry, maxComplexity: 7 }] });
    expect(() => loadCapabilityCatalog(file)).toThrow(/providers\.0\.maxComplexity/);
  });

  it('rejects an unknown upstream', () => {
    const file = writeCatalog('upstream.json', { providers: [{ ...entry, provider: 'elsewhere' }] });
    expect(() => loadCapabilityCatalog(file)).toThrow(/providers\.0\.provider/);
  });
});
