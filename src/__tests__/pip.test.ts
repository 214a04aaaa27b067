/**
 * ClaimScout Python & Cargo Manifest Tests
 */

import { describe, it, expect } from 'vitest';
import { parsePipSpecification, parseRequirementsTxt, parseSetupPy, parsePyprojectToml } from '../manifests/pip.js';
import { parseCargoToml } from '../manifests/cargo.js';
import { scanSections } from '../manifests/sections.js';

describe('parsePipSpecification', () => {
  it('keeps the operator with the version', () => {
    expect(parsePipSpecification('requests==2.28.0')).toEqual({ name: 'requests', version: '==2.28.0' });
  });

  it('uses unknown when there is no operator', () => {
    expect(parsePipSpecification('flask')).toEqual({ name: 'flask', version: 'unknown' });
  });

  it('splits on the first operator in check order', () => {
    expect(parsePipSpecification('django>=3.2,<4')).toEqual({ name: 'django', version: '>=3.2,<4' });
    expect(parsePipSpecification('numpy ~= 1.21')).toEqual({ name: 'numpy', version: '~=1.21' });
    expect(parsePipSpecification('pkg!=1.0')).toEqual({ name: 'pkg', version: '!=1.0' });
  });
});

describe('parseRequirementsTxt', () => {
  it('emits one record per requirement line', () => {
    const content = ['# pinned', 'requests==2.28.0', '', 'flask'].join('\n');

    const records = parseRequirementsTxt('requirements.txt', content);

    expect(records).toEqual([
      {
        name: 'requests',
        versionSpec: '==2.28.0',
        role: 'dependency',
        category: 'requirements',
        ecosystem: 'pip',
        sourceLocator: 'requirements.txt:2',
      },
      {
        name: 'flask',
        versionSpec: 'unknown',
        role: 'dependency',
        category: 'requirements',
        ecosystem: 'pip',
        sourceLocator: 'requirements.txt:4',
      },
    ]);
  });

  it('handles CRLF line endings', () => {
    const records = parseRequirementsTxt('requirements.txt', 'click>=8\r\nrich\r\n');
    expect(records.map(r => [r.name, r.versionSpec])).toEqual([['click', '>=8'], ['rich', 'unknown']]);
  });
});

describe('parseSetupPy', () => {
  it('reads install_requires and the package identity', () => {
    const content = [
      'from setuptools import setup',
      '',
      'setup(',
      '    name="sample-app",',
      '    version="0.1.0",',
      '    install_requires=[',
      '        "requests>=2.0",',
      "        'click',",
      '    ],',
      ')',
    ].join('\n');

    const records = parseSetupPy('setup.py', content);

    expect(records.map(r => [r.name, r.versionSpec, r.role, r.category, r.sourceLocator])).toEqual([
      ['requests', '>=2.0', 'dependency', 'install_requires', 'setup.py:7'],
      ['click', 'unknown', 'dependency', 'install_requires', 'setup.py:8'],
      ['sample-app', '0.1.0', 'main_package', 'main', 'setup.py:4'],
    ]);
  });

  it('returns nothing when setup() has no literals', () => {
    expect(parseSetupPy('setup.py', 'from setuptools import setup\nsetup()\n')).toEqual([]);
  });
});

describe('parsePyprojectToml', () => {
  it('reads only the dependency sections', () => {
    const content = [
      '[tool.poetry]',
      'name = "svc"',
      '',
      '[tool.poetry.dependencies]',
      'python = "^3.10"',
      '"httpx" = "^0.27"',
      '# commented = "1"',
      '[tool.poetry.dev-dependencies]',
      'pytest = "^7"',
    ].join('\n');

    const records = parsePyprojectToml('pyproject.toml', content);

    expect(records.map(r => [r.name, r.versionSpec, r.sourceLocator])).toEqual([
      ['python', '^3.10', 'pyproject.toml:5'],
      ['httpx', '^0.27', 'pyproject.toml:6'],
    ]);
    expect(records[0].category).toBe('dependencies');
  });
});

describe('parseCargoToml', () => {
  it('keeps key quotes and strips value quotes', () => {
    const content = [
      '[package]',
      'name = "crate"',
      '',
      '[dependencies]',
      'serde = "1.0"',
      'tokio = { version = "1", features = ["full"] }',
      '"quoted" = "2"',
      '',
      '[dev-dependencies]',
      'criterion = "0.5"',
    ].join('\n');

    const records = parseCargoToml('Cargo.toml', content);

    expect(records.map(r => [r.name, r.versionSpec])).toEqual([
      ['serde', '1.0'],
      ['tokio', '{ version = "1", features = ["full"] }'],
      ['"quoted"', '2'],
    ]);
    expect(records[0]).toMatchObject({ ecosystem: 'cargo', category: 'dependencies', sourceLocator: 'Cargo.toml:5' });
  });
});

describe('scanSections', () => {
  it('leaves the section on any bracket line', () => {
    const entries = scanSections('[deps]\na = 1\n[other]\nb = 2\n[deps]\nc = 3', {
      triggers: ['[deps]'],
      unquoteKeys: false,
    });

    expect(entries).toEqual([
      { key: 'a', value: '1', line: 2 },
      { key: 'c', value: '3', line: 6 },
    ]);
  });
});
