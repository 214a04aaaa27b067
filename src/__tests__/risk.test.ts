/**
 * ClaimScout Risk Scorer Tests
 */

import { describe, it, expect } from 'vitest';
import { scoreName, isSimilarName } from '../risk/index.js';

describe('scoreName', () => {
  it('flags near-identity to a popular package', () => {
    expect(scoreName('lodah')).toEqual({ isSuspicious: true, reason: 'name_similarity', matched: 'lodash' });
    expect(scoreName('expres')).toEqual({ isSuspicious: true, reason: 'name_similarity', matched: 'express' });
    expect(scoreName('axioss')).toEqual({ isSuspicious: true, reason: 'name_similarity', matched: 'axios' });
  });

  it('treats an exact popular name as similar', () => {
    expect(scoreName('react').reason).toBe('name_similarity');
  });

  it('flags short names', () => {
    expect(scoreName('ab')).toEqual({ isSuspicious: true, reason: 'short_name' });
  });

  it('flags suspicious keywords before other rules', () => {
    expect(scoreName('my-test-lib')).toEqual({ isSuspicious: true, reason: 'keyword_match', matched: 'test' });
    expect(scoreName('Internal-ADMIN-panel')).toMatchObject({ reason: 'keyword_match', matched: 'admin' });
  });

  it('passes unrelated names', () => {
    expect(scoreName('completely-unrelated-package-name')).toEqual({ isSuspicious: false, reason: 'none' });
    expect(scoreName('webpack12')).toEqual({ isSuspicious: false, reason: 'none' });
  });

  it('accepts replacement lists', () => {
    expect(scoreName('internal-tool', { keywords: ['internal'] })).toMatchObject({
      reason: 'keyword_match',
      matched: 'internal',
    });
    expect(scoreName('test-x', { keywords: [] }).isSuspicious).toBe(false);
    expect(scoreName('fastifx', { popularPackages: ['fastify'] })).toMatchObject({
      reason: 'name_similarity',
      matched: 'fastify',
    });
  });
});

describe('isSimilarName', () => {
  it('allows one substitution at equal length', () => {
    expect(isSimilarName('abc', 'abd')).toBe(true);
    expect(isSimilarName('abc', 'xyz')).toBe(false);
  });

  it('allows one insertion when lengths differ by one', () => {
    expect(isSimilarName('reac', 'react')).toBe(true);
    expect(isSimilarName('react', 'reac')).toBe(true);
    expect(isSimilarName('raect', 'reactx')).toBe(false);
  });

  it('never matches a gap of two or more', () => {
    expect(isSimilarName('ab', 'abcd')).toBe(false);
    expect(isSimilarName('vue', 'vuejs-x')).toBe(false);
  });
});
