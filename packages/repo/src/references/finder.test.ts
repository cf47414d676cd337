import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_CONFIG, SilentLogger, createRunConfig } from '@contextpack/shared';
import { RepoScanner } from '../scanner';
import { createTmpRepo } from '../__fixtures__/tmp-repo';
import type { TmpRepo } from '../__fixtures__/tmp-repo';
import { ReferenceFinder } from './finder';

describe('ReferenceFinder', () => {
  let repo: TmpRepo;
  const config = createRunConfig(DEFAULT_CONFIG);
  const finder = () =>
    new ReferenceFinder({ scanner: new RepoScanner(), logger: new SilentLogger() });

  beforeEach(async () => {
    repo = await createTmpRepo('references');
    await repo.write({
      'Cart.swift': 'struct Cart {}',
      'CartView.swift': 'let cart: Cart',
      'Checkout.m': '[Cart new];',
      'CartItem.swift': 'struct CartItem {}',
      'README.md': 'Cart docs',
    });
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  it('returns declaration and usage sites as whole words', async () => {
    expect(await finder().findReferences('Cart', repo.root, config)).toEqual([
      repo.path('Cart.swift'),
      repo.path('CartView.swift'),
      repo.path('Checkout.m'),
    ]);
  });
});
