import { describe, it, expect } from 'vitest';

import { importIndicatorSet } from '@/modules/indicators/core/usecases/import-indicator-set.js';
import { replaceTags } from '@/modules/indicators/core/usecases/replace-tags.js';
import { updateFormula } from '@/modules/indicators/core/usecases/update-formula.js';

import { makeIndicatorDocument, makeIndicatorSetDocument } from '../../fixtures/builders.js';
import { makeFakeIndicatorRepo, type FakeIndicatorRepo } from '../../fixtures/fakes.js';

/**
 * Indicator 1 has a formula, indicator 2 does not.
 */
const seedCatalog = async (): Promise<FakeIndicatorRepo> => {
  const indicatorRepo = makeFakeIndicatorRepo();
  const document = makeIndicatorSetDocument({
    indicadores: [
      makeIndicatorDocument(),
      makeIndicatorDocument({ nome_indicador: 'Tempo de Atendimento', formula: null }),
    ],
  });
  (await importIndicatorSet({ indicatorRepo }, { document }))._unsafeUnwrap();
  return indicatorRepo;
};

describe('updateFormula', () => {
  it('patches only the supplied fields', async () => {
    const indicatorRepo = await seedCatalog();

    const result = await updateFormula(
      { indicatorRepo },
      { indicatorId: 1, patch: { hash: 'hash-nova' } }
    );

    expect(result._unsafeUnwrap()).toEqual({
      id: 1,
      indicatorId: 1,
      raw: 'PA / PT * 100',
      normalized: 'pa/pt*100',
      hash: 'hash-nova',
    });
  });

  it('persists the patch', async () => {
    const indicatorRepo = await seedCatalog();

    await updateFormula(
      { indicatorRepo },
      { indicatorId: 1, patch: { raw: 'PA/PT', normalized: 'pa/pt' } }
    );

    const indicator = (await indicatorRepo.getIndicator(1))._unsafeUnwrap();
    expect(indicator?.formula?.raw).toBe('PA/PT');
    expect(indicator?.formula?.normalized).toBe('pa/pt');
    expect(indicator?.formula?.hash).toBe('hash-disp');
  });

  it('returns the formula unchanged for an empty patch', async () => {
    const indicatorRepo = await seedCatalog();

    const result = await updateFormula({ indicatorRepo }, { indicatorId: 1, patch: {} });

    expect(result._unsafeUnwrap().hash).toBe('hash-disp');
  });

  it('refuses to patch an indicator without formula', async () => {
    const indicatorRepo = await seedCatalog();

    const result = await updateFormula(
      { indicatorRepo },
      { indicatorId: 2, patch: { raw: 'T/N' } }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'FormulaNotFoundError',
      message: "Indicator 'Tempo de Atendimento' (id 2) has no formula",
      indicatorId: 2,
    });
    const indicator = (await indicatorRepo.getIndicator(2))._unsafeUnwrap();
    expect(indicator?.formula).toBeNull();
  });

  it('returns not found for an unknown indicator', async () => {
    const indicatorRepo = await seedCatalog();

    const result = await updateFormula(
      { indicatorRepo },
      { indicatorId: 42, patch: { raw: 'x' } }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'IndicatorNotFoundError',
      message: 'Indicator with id 42 not found',
      id: 42,
    });
  });
});

describe('replaceTags', () => {
  it('replaces the whole tag list', async () => {
    const indicatorRepo = await seedCatalog();

    const result = await replaceTags(
      { indicatorRepo },
      { indicatorId: 1, tags: ['qualidade', 'manutencao'] }
    );

    expect(result._unsafeUnwrap()).toEqual(['qualidade', 'manutencao']);
    const indicator = (await indicatorRepo.getIndicator(1))._unsafeUnwrap();
    expect(indicator?.tags).toEqual(['qualidade', 'manutencao']);
  });

  it('accepts an empty list', async () => {
    const indicatorRepo = await seedCatalog();

    const result = await replaceTags({ indicatorRepo }, { indicatorId: 1, tags: [] });

    expect(result._unsafeUnwrap()).toEqual([]);
  });

  it('returns not found for an unknown indicator', async () => {
    const indicatorRepo = await seedCatalog();

    const result = await replaceTags({ indicatorRepo }, { indicatorId: 9, tags: ['x'] });

    expect(result._unsafeUnwrapErr().type).toBe('IndicatorNotFoundError');
  });
});
