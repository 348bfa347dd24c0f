import { describe, it, expect } from 'vitest';

import { importIndicatorSet } from '@/modules/indicators/core/usecases/import-indicator-set.js';

import { makeIndicatorDocument, makeIndicatorSetDocument } from '../../fixtures/builders.js';
import { makeFakeIndicatorRepo } from '../../fixtures/fakes.js';

describe('importIndicatorSet', () => {
  it('stores the whole tree and returns it with generated ids', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();

    const result = await importIndicatorSet(
      { indicatorRepo },
      { document: makeIndicatorSetDocument() }
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const set = result.value;
      expect(set.id).toBe(1);
      expect(set.name).toBe('Campinas');
      expect(set.stateCode).toBe('SP');
      expect(set.tenderId).toBe('PE-001/2024');
      expect(set.tenderYear).toBe(2024);
      expect(set.indicators).toHaveLength(1);

      const [indicator] = set.indicators;
      expect(indicator?.name).toBe('Indice de Disponibilidade');
      expect(indicator?.formula).toEqual({
        id: 1,
        indicatorId: 1,
        raw: 'PA / PT * 100',
        normalized: 'pa/pt*100',
        hash: 'hash-disp',
      });
      expect(indicator?.subIndicators.map((s) => s.name)).toEqual(['PA', 'PT']);
      expect(indicator?.conditions).toEqual([
        { id: 1, indicatorId: 1, rule: '>= 98%', score: 10 },
        { id: 2, indicatorId: 1, rule: '< 98%', score: 0 },
      ]);
    }

    expect(indicatorRepo.counts()).toEqual({
      municipalities: 1,
      indicators: 1,
      formulas: 1,
      subIndicators: 2,
      conditions: 2,
    });
  });

  it('accepts a document without indicators', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();

    const result = await importIndicatorSet(
      { indicatorRepo },
      { document: { municipio: 'Sorocaba', uf: 'SP' } }
    );

    const set = result._unsafeUnwrap();
    expect(set.tenderId).toBeNull();
    expect(set.tenderYear).toBeNull();
    expect(set.indicators).toEqual([]);
  });

  it('rejects a second import of the same municipality and tender', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await importIndicatorSet({ indicatorRepo }, { document: makeIndicatorSetDocument() });
    const before = indicatorRepo.counts();

    const result = await importIndicatorSet(
      { indicatorRepo },
      {
        document: makeIndicatorSetDocument({
          indicadores: [makeIndicatorDocument({ nome_indicador: 'Tempo de Atendimento' })],
        }),
      }
    );

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('DuplicateIndicatorSetError');
    expect(error.message).toBe(
      'Indicator set already imported for Campinas/SP (tender PE-001/2024, year 2024)'
    );
    expect(indicatorRepo.counts()).toEqual(before);
  });

  it('imports the same municipality again for a different tender year', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await importIndicatorSet({ indicatorRepo }, { document: makeIndicatorSetDocument() });

    const result = await importIndicatorSet(
      { indicatorRepo },
      { document: makeIndicatorSetDocument({ ano_edital: 2025 }) }
    );

    expect(result._unsafeUnwrap().id).toBe(2);
    expect(indicatorRepo.counts().municipalities).toBe(2);
  });

  it('rejects a document with a nameless indicator and stores nothing', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();

    const result = await importIndicatorSet(
      { indicatorRepo },
      {
        document: makeIndicatorSetDocument({
          indicadores: [makeIndicatorDocument(), makeIndicatorDocument({ nome_indicador: '' })],
        }),
      }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MissingRequiredFieldError',
      message: 'Missing required field in document: indicadores[1].nome_indicador',
      field: 'indicadores[1].nome_indicador',
    });
    expect(indicatorRepo.counts().municipalities).toBe(0);
  });

  it('propagates database errors', async () => {
    const indicatorRepo = makeFakeIndicatorRepo({ simulateDbError: true });

    const result = await importIndicatorSet(
      { indicatorRepo },
      { document: makeIndicatorSetDocument() }
    );

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});
