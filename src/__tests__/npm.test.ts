/**
 * ClaimScout npm & Composer Manifest Tests
 */

import { describe, it, expect } from 'vitest';
import { parsePackageJson, findScriptReferences } from '../manifests/npm.js';
import { parseComposerJson } from '../manifests/composer.js';
import { parseManifest } from '../manifests/index.js';
import { ManifestParseError } from '../errors.js';

describe('parsePackageJson', () => {
  it('emits the main package and one record per dependency', () => {
    const content = JSON.stringify({
      name: 'x',
      version: '1.0.0',
      dependencies: { a: '^1.0.0', b: '2.0.0' },
    });

    const records = parsePackageJson('package.json', content);

    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({
      name: 'x',
      versionSpec: '1.0.0',
      role: 'main_package',
      category: 'main',
      ecosystem: 'npm',
      sourceLocator: 'package.json#name',
    });
    expect(records[1]).toMatchObject({ name: 'a', versionSpec: '^1.0.0', role: 'dependency', category: 'dependencies' });
    expect(records[2]).toMatchObject({ name: 'b', versionSpec: '2.0.0', role: 'dependency' });
    expect(records[1].sourceLocator).toBe('package.json#dependencies/a');
  });

  it('reads every dependency field with its own category', () => {
    const content = JSON.stringify({
      devDependencies: { vitest: '^1.6.0' },
      peerDependencies: { react: '>=18' },
      optionalDependencies: { fsevents: '*' },
    });

    const records = parsePackageJson('package.json', content);

    expect(records.map(r => [r.name, r.category])).toEqual([
      ['vitest', 'devDependencies'],
      ['react', 'peerDependencies'],
      ['fsevents', 'optionalDependencies'],
    ]);
  });

  it('drops empty names and maps non-string versions to unknown', () => {
    const content = JSON.stringify({
      name: '',
      dependencies: { '': '1.0.0', ' ': '1.0.0', local: { path: '../local' } },
    });

    const records = parsePackageJson('package.json', content);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ name: 'local', versionSpec: 'unknown' });
  });

  it('uses unknown when the main package has no version', () => {
    const records = parsePackageJson('package.json', '{"name":"app"}');
    expect(records[0].versionSpec).toBe('unknown');
  });

  it('tags every script reference as npm', () => {
    const content = JSON.stringify({
      name: 'app',
      scripts: {
        setup: 'npm install -D left-pad && pip install requests',
        php: 'composer require monolog/monolog',
      },
    });

    const records = parsePackageJson('package.json', content);
    const refs = records.filter(r => r.role === 'script_reference');

    expect(refs.map(r => [r.name, r.ecosystem])).toEqual([
      ['left-pad', 'npm'],
      ['requests', 'npm'],
      ['monolog/monolog', 'npm'],
    ]);
    expect(refs[0]).toMatchObject({ versionSpec: 'unknown', category: 'scripts', sourceLocator: 'package.json#scripts/setup' });
    expect(refs[2].sourceLocator).toBe('package.json#scripts/php');
  });

  it('skips scripts when script references are disabled', () => {
    const content = JSON.stringify({ name: 'app', scripts: { setup: 'npm install left-pad' } });

    const records = parsePackageJson('package.json', content, { scriptReferences: false });

    expect(records).toHaveLength(1);
    expect(records[0].role).toBe('main_package');
  });

  it('throws when the root is not an object', () => {
    expect(() => parsePackageJson('package.json', '[1, 2]')).toThrow('package.json root is not an object');
  });
});

describe('findScriptReferences', () => {
  it('skips flags and keeps scoped names', () => {
    expect(findScriptReferences('yarn add --dev @scope/pkg')).toEqual([{ name: '@scope/pkg', tool: 'yarn' }]);
  });

  it('finds several commands in one script', () => {
    const refs = findScriptReferences('npm install chalk; npm install --save-dev tsx');
    expect(refs.map(r => r.name)).toEqual(['chalk', 'tsx']);
  });

  it('records the installing tool', () => {
    const refs = findScriptReferences('pip install -q requests && composer require monolog/monolog');
    expect(refs).toEqual([
      { name: 'requests', tool: 'pip' },
      { name: 'monolog/monolog', tool: 'composer' },
    ]);
  });

  it('returns nothing for scripts without install commands', () => {
    expect(findScriptReferences('tsc -p . && vitest run')).toEqual([]);
  });
});

describe('parseComposerJson', () => {
  it('reads require and require-dev', () => {
    const content = JSON.stringify({
      name: 'acme/app',
      require: { php: '>=8.1', 'monolog/monolog': '^3.0' },
      'require-dev': { 'phpunit/phpunit': '^10' },
    });

    const records = parseComposerJson('composer.json', content);

    expect(records.map(r => [r.name, r.versionSpec, r.category])).toEqual([
      ['acme/app', 'unknown', 'main'],
      ['php', '>=8.1', 'require'],
      ['monolog/monolog', '^3.0', 'require'],
      ['phpunit/phpunit', '^10', 'require-dev'],
    ]);
    expect(records.every(r => r.ecosystem === 'composer')).toBe(true);
  });
});

describe('parseManifest', () => {
  it('returns a parse error for malformed JSON', () => {
    const result = parseManifest('package.json', '{ "name": ');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ManifestParseError);
      expect(result.error.file).toBe('package.json');
      expect(result.error.ecosystem).toBe('npm');
      expect(result.error.message.startsWith('Failed to parse package.json: ')).toBe(true);
    }
  });

  it('returns no records for empty content', () => {
    expect(parseManifest('package.json', '  \n')).toEqual({ ok: true, records: [] });
  });

  it('rejects files it does not recognize', () => {
    const result = parseManifest('README.md', '# readme');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.ecosystem).toBeNull();
    }
  });

  it('passes script options through', () => {
    const content = JSON.stringify({ scripts: { a: 'npm install chalk' } });

    expect(parseManifest('package.json', content, { scriptReferences: false })).toEqual({ ok: true, records: [] });
  });
});
