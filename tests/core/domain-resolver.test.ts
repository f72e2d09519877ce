/**
 * Tests for company domain resolution
 */

import { describe, it, expect } from 'vitest';
import { HeuristicDomainResolver, companySlug } from '../../src/core/domain-resolver.js';
import { DomainResolutionError } from '../../src/types/errors.js';
import { createFetchStub, htmlPage } from '../helpers/fetch-stub.js';

describe('companySlug', () => {
  it('should drop punctuation and legal suffixes', () => {
    expect(companySlug('Acme Widgets, Inc.')).toBe('acmewidgets');
    expect(companySlug('Smith & Sons Co')).toBe('smithandsons');
    expect(companySlug('Nordwind Logistik GmbH')).toBe('nordwindlogistik');
  });

  it('should strip diacritics', () => {
    expect(companySlug('Café Zürich')).toBe('cafezurich');
  });

  it('should keep a name that is only a suffix word', () => {
    expect(companySlug('Company')).toBe('company');
  });

  it('should return an empty slug for names without letters or digits', () => {
    expect(companySlug('!!!')).toBe('');
  });
});

describe('HeuristicDomainResolver', () => {
  it('should take the first candidate that answers', async () => {
    const fetchFn = createFetchStub({ 'https://acmewidgets.io/': { body: htmlPage('<p>Acme</p>') } });
    const resolver = new HeuristicDomainResolver({ fetchFn });

    await expect(resolver.resolve('Acme Widgets, Inc.')).resolves.toBe('https://acmewidgets.io/');
    expect(fetchFn.mock.calls.map(([url]) => url)).toEqual(['https://acmewidgets.com/', 'https://acmewidgets.io/']);
  });

  it('should move past candidates that fail to connect', async () => {
    const fetchFn = createFetchStub({
      'https://acme.com/': { error: new TypeError('fetch failed', { cause: { code: 'ENOTFOUND' } }) },
      'https://acme.io/': { status: 500, body: 'error' },
      'https://acme.co/': { body: htmlPage('<p>Acme</p>') },
    });
    const resolver = new HeuristicDomainResolver({ fetchFn });

    await expect(resolver.resolve('Acme')).resolves.toBe('https://acme.co/');
  });

  it('should report every probed candidate when none answers', async () => {
    const resolver = new HeuristicDomainResolver({ fetchFn: createFetchStub({}) });

    let caught: unknown;
    try {
      await resolver.resolve('Acme');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DomainResolutionError);
    expect(caught).toMatchObject({
      message: 'Could not resolve a website for "Acme"',
      probed: ['https://acme.com/', 'https://acme.io/', 'https://acme.co/', 'https://acme.ai/'],
    });
  });

  it('should fail without probing when the name yields no slug', async () => {
    const fetchFn = createFetchStub({});
    const resolver = new HeuristicDomainResolver({ fetchFn });

    await expect(resolver.resolve('***')).rejects.toMatchObject({ probed: [] });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
