/**
 * ClaimScout Go, Ruby & NuGet Manifests + Ecosystem Registry Tests
 */

import { describe, it, expect } from 'vitest';
import { detectManifest, displayPattern, listManifestTypes, isEcosystem } from '../ecosystems/index.js';
import { parseGoMod, parseGoSum } from '../manifests/go.js';
import { parseGemfile, parseGemfileLock } from '../manifests/ruby.js';
import { parsePackagesConfig, parseMsbuildProject } from '../manifests/nuget.js';
import { parseManifest } from '../manifests/index.js';

describe('detectManifest', () => {
  it('matches basenames case-insensitively', () => {
    expect(detectManifest('repo/web/Package.JSON')?.ecosystem).toBe('npm');
    expect(detectManifest('Gemfile')?.format).toBe('gemfile');
    expect(detectManifest('Gemfile.lock')?.format).toBe('gemfile-lock');
    expect(detectManifest('Cargo.toml')?.ecosystem).toBe('cargo');
    expect(detectManifest('build.gradle.kts')?.ecosystem).toBe('gradle');
  });

  it('matches project files by suffix', () => {
    expect(detectManifest('src/App.csproj')?.format).toBe('msbuild-project');
    expect(detectManifest('src/Legacy.VBPROJ')?.ecosystem).toBe('nuget');
    expect(detectManifest('src/.csproj')).toBeNull();
  });

  it('returns null for other files', () => {
    expect(detectManifest('README.md')).toBeNull();
    expect(detectManifest('package.json.bak')).toBeNull();
  });
});

describe('ecosystem table', () => {
  it('covers all nine ecosystems', () => {
    const ecosystems = new Set(listManifestTypes().map(t => t.ecosystem));
    expect(ecosystems.size).toBe(9);
  });

  it('formats patterns for display', () => {
    const csproj = listManifestTypes().find(t => t.pattern === '.csproj');
    expect(csproj && displayPattern(csproj)).toBe('*.csproj');
    expect(displayPattern(listManifestTypes()[0])).toBe('package.json');
  });

  it('recognizes ecosystem names', () => {
    expect(isEcosystem('nuget')).toBe(true);
    expect(isEcosystem('pypi')).toBe(false);
  });
});

describe('parseGoMod', () => {
  const content = [
    'module example.com/app',
    '',
    'go 1.21',
    '',
    'require github.com/pkg/errors v0.9.1',
    '',
    'require (',
    '\tgolang.org/x/text v0.14.0',
    '\tgithub.com/stretchr/testify v1.8.4 // indirect',
    ')',
    '',
    'replace example.com/old => example.com/new v1.0.0',
  ].join('\n');

  it('reads single-line and block directives', () => {
    const records = parseGoMod('go.mod', content);

    expect(records.map(r => [r.name, r.versionSpec, r.category, r.sourceLocator])).toEqual([
      ['github.com/pkg/errors', 'v0.9.1', 'require', 'go.mod:5'],
      ['golang.org/x/text', 'v0.14.0', 'require', 'go.mod:8'],
      ['github.com/stretchr/testify', 'v1.8.4', 'require', 'go.mod:9'],
      ['example.com/old', 'unknown', 'replace', 'go.mod:12'],
    ]);
  });

  it('reads versions from replace directives', () => {
    const records = parseGoMod('go.mod', 'replace example.com/lib v1.2.0 => ../lib');
    expect(records[0]).toMatchObject({ name: 'example.com/lib', versionSpec: 'v1.2.0', ecosystem: 'go' });
  });
});

describe('parseGoSum', () => {
  it('emits each module version once', () => {
    const content = [
      'github.com/pkg/errors v0.9.1 h1:placeholder-a=',
      'github.com/pkg/errors v0.9.1/go.mod h1:placeholder-b=',
      'golang.org/x/text v0.14.0/go.mod h1:placeholder-c=',
    ].join('\n');

    const records = parseGoSum('go.sum', content);

    expect(records.map(r => [r.name, r.versionSpec, r.category, r.sourceLocator])).toEqual([
      ['github.com/pkg/errors', 'v0.9.1', 'sum', 'go.sum:1'],
      ['golang.org/x/text', 'v0.14.0', 'sum', 'go.sum:3'],
    ]);
  });
});

describe('parseGemfile', () => {
  it('reads gem declarations', () => {
    const content = [
      "source 'https://rubygems.org'",
      '',
      "gem 'rails', '~> 7.0'",
      'gem "puma"',
      "  gem 'nested', '1.0'",
      "# gem 'commented'",
    ].join('\n');

    const records = parseGemfile('Gemfile', content);

    expect(records.map(r => [r.name, r.versionSpec, r.sourceLocator])).toEqual([
      ['rails', '~> 7.0', 'Gemfile:3'],
      ['puma', 'unknown', 'Gemfile:4'],
      ['nested', '1.0', 'Gemfile:5'],
    ]);
    expect(records[0]).toMatchObject({ ecosystem: 'ruby', category: 'gem' });
  });
});

describe('parseGemfileLock', () => {
  it('reads top-level specs only', () => {
    const content = [
      'GEM',
      '  remote: https://rubygems.org/',
      '  specs:',
      '    rack (3.0.8)',
      '    rails (7.0.8)',
      '      actionpack (= 7.0.8)',
      '',
      'PLATFORMS',
      '  ruby',
      '',
      'DEPENDENCIES',
      '  rails (~> 7.0)',
    ].join('\n');

    const records = parseGemfileLock('Gemfile.lock', content);

    expect(records.map(r => [r.name, r.versionSpec, r.category, r.sourceLocator])).toEqual([
      ['rack', '3.0.8', 'locked', 'Gemfile.lock:4'],
      ['rails', '7.0.8', 'locked', 'Gemfile.lock:5'],
    ]);
  });
});

describe('NuGet parsers', () => {
  it('reads packages.config entries', () => {
    const content = `<?xml version="1.0" encoding="utf-8"?>
<packages>
  <package id="Newtonsoft.Json" version="13.0.3" targetFramework="net48" />
  <package id="NUnit" version="3.14.0" />
</packages>`;

    const records = parsePackagesConfig('packages.config', content);

    expect(records.map(r => [r.name, r.versionSpec, r.category, r.sourceLocator])).toEqual([
      ['Newtonsoft.Json', '13.0.3', 'package', 'packages.config#/packages[1]/package[1]'],
      ['NUnit', '3.14.0', 'package', 'packages.config#/packages[1]/package[2]'],
    ]);
  });

  it('reads PackageReference attributes and nested versions', () => {
    const content = `<Project Sdk="Microsoft.NET.Sdk">
  <ItemGroup>
    <PackageReference Include="Serilog" Version="3.1.1" />
    <PackageReference Include="Dapper">
      <Version>2.1.24</Version>
    </PackageReference>
    <PackageReference Update="Ignored" />
  </ItemGroup>
</Project>`;

    const records = parseMsbuildProject('App.csproj', content);

    expect(records.map(r => [r.name, r.versionSpec, r.sourceLocator])).toEqual([
      ['Serilog', '3.1.1', 'App.csproj#/Project[1]/ItemGroup[1]/PackageReference[1]'],
      ['Dapper', '2.1.24', 'App.csproj#/Project[1]/ItemGroup[1]/PackageReference[2]'],
    ]);
    expect(records[0]).toMatchObject({ ecosystem: 'nuget', category: 'PackageReference' });
  });

  it('dispatches project files through parseManifest', () => {
    const result = parseManifest('Tool.vbproj', '<Project><ItemGroup><PackageReference Include="Humanizer" Version="2.14.1"/></ItemGroup></Project>');

    expect(result.ok && result.records.map(r => r.name)).toEqual(['Humanizer']);
  });
});
