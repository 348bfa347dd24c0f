import { describe, it, expect } from 'vitest';

import { deleteAllIndicatorSets } from '@/modules/indicators/core/usecases/delete-all-indicator-sets.js';
import { deleteIndicatorSet } from '@/modules/indicators/core/usecases/delete-indicator-set.js';
import { exportIndicatorSet } from '@/modules/indicators/core/usecases/export-indicator-set.js';
import { getIndicatorSet } from '@/modules/indicators/core/usecases/get-indicator-set.js';
import { getIndicatorsByMunicipality } from '@/modules/indicators/core/usecases/get-indicators-by-municipality.js';
import { importIndicatorSet } from '@/modules/indicators/core/usecases/import-indicator-set.js';
import {
  cleanFilter,
  listIndicatorSets,
} from '@/modules/indicators/core/usecases/list-indicator-sets.js';
import { updateIndicatorSet } from '@/modules/indicators/core/usecases/update-indicator-set.js';

import { makeIndicatorDocument, makeIndicatorSetDocument } from '../../fixtures/builders.js';
import { makeFakeIndicatorRepo, type FakeIndicatorRepo } from '../../fixtures/fakes.js';

import type { ExportedIndicatorSet } from '@/modules/indicators/core/document.js';

const seed = async (
  indicatorRepo: FakeIndicatorRepo,
  documents: ExportedIndicatorSet[]
): Promise<void> => {
  for (const document of documents) {
    const result = await importIndicatorSet({ indicatorRepo }, { document });
    expect(result.isOk()).toBe(true);
  }
};

const campinas = makeIndicatorSetDocument();
const beloHorizonte = makeIndicatorSetDocument({
  municipio: 'Belo Horizonte',
  uf: 'MG',
  edital: 'CC-12/2023',
  ano_edital: 2023,
});

describe('cleanFilter', () => {
  it('drops blank text filters and keeps the year', () => {
    expect(
      cleanFilter({ name: ' ', stateCode: 'SP', tenderId: '', tenderYear: 2024 })
    ).toEqual({ stateCode: 'SP', tenderYear: 2024 });
  });
});

describe('listIndicatorSets', () => {
  it('lists every set ordered by id when no filter is given', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas, beloHorizonte]);

    const result = await listIndicatorSets({ indicatorRepo }, { filter: {} });

    expect(result._unsafeUnwrap().map((s) => s.name)).toEqual(['Campinas', 'Belo Horizonte']);
  });

  it('ANDs the supplied filters', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas, beloHorizonte]);

    const result = await listIndicatorSets(
      { indicatorRepo },
      { filter: { stateCode: 'MG', tenderYear: 2023 } }
    );

    expect(result._unsafeUnwrap().map((s) => s.id)).toEqual([2]);
  });

  it('reports filters that match nothing', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [beloHorizonte]);

    const result = await listIndicatorSets({ indicatorRepo }, { filter: { stateCode: 'SP' } });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NoMatchingIndicatorSetsError',
      message: 'No indicator sets found for filters {"stateCode":"SP"}',
      filter: { stateCode: 'SP' },
    });
  });

  it('reports an empty catalog the same way', async () => {
    const result = await listIndicatorSets(
      { indicatorRepo: makeFakeIndicatorRepo() },
      { filter: {} }
    );

    expect(result._unsafeUnwrapErr().type).toBe('NoMatchingIndicatorSetsError');
  });
});

describe('getIndicatorSet', () => {
  it('returns the set with its indicators', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas]);

    const set = (await getIndicatorSet({ indicatorRepo }, { id: 1 }))._unsafeUnwrap();

    expect(set.name).toBe('Campinas');
    expect(set.indicators.map((i) => i.name)).toEqual(['Indice de Disponibilidade']);
  });

  it('returns not found for an unknown id', async () => {
    const result = await getIndicatorSet({ indicatorRepo: makeFakeIndicatorRepo() }, { id: 99 });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'IndicatorSetNotFoundError',
      message: 'Indicator set with id 99 not found',
      id: 99,
    });
  });
});

describe('updateIndicatorSet', () => {
  it('replaces the scalar fields and keeps the indicators', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas]);

    const result = await updateIndicatorSet(
      { indicatorRepo },
      {
        id: 1,
        fields: { name: 'Campinas', stateCode: 'SP', tenderId: null, tenderYear: null },
      }
    );

    const set = result._unsafeUnwrap();
    expect(set.tenderId).toBeNull();
    expect(set.tenderYear).toBeNull();
    expect(set.indicators).toHaveLength(1);
  });

  it('returns not found for an unknown id', async () => {
    const result = await updateIndicatorSet(
      { indicatorRepo: makeFakeIndicatorRepo() },
      { id: 3, fields: { name: 'X', stateCode: 'SP', tenderId: null, tenderYear: null } }
    );

    expect(result._unsafeUnwrapErr().type).toBe('IndicatorSetNotFoundError');
  });
});

describe('deleteIndicatorSet', () => {
  it('removes the municipality and everything below it', async () => {
    const indicatorRepo = makeFakeIndicatorRepo({ firstMunicipalityId: 7 });
    await seed(indicatorRepo, [
      makeIndicatorSetDocument({
        indicadores: [
          makeIndicatorDocument({ nome_indicador: 'Disponibilidade' }),
          makeIndicatorDocument({ nome_indicador: 'Tempo de Atendimento' }),
          makeIndicatorDocument({ nome_indicador: 'Eficiencia Energetica' }),
        ],
      }),
    ]);

    const result = await deleteIndicatorSet({ indicatorRepo }, { id: 7 });

    expect(result._unsafeUnwrap()).toEqual({
      id: 7,
      name: 'Campinas',
      stateCode: 'SP',
      tenderId: 'PE-001/2024',
      tenderYear: 2024,
    });
    expect(indicatorRepo.counts()).toEqual({
      municipalities: 0,
      indicators: 0,
      formulas: 0,
      subIndicators: 0,
      conditions: 0,
    });
    expect((await indicatorRepo.getIndicator(1))._unsafeUnwrap()).toBeNull();
  });

  it('leaves other municipalities untouched', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas, beloHorizonte]);

    await deleteIndicatorSet({ indicatorRepo }, { id: 1 });

    expect(indicatorRepo.counts()).toEqual({
      municipalities: 1,
      indicators: 1,
      formulas: 1,
      subIndicators: 2,
      conditions: 2,
    });
  });

  it('returns not found for an unknown id', async () => {
    const result = await deleteIndicatorSet({ indicatorRepo: makeFakeIndicatorRepo() }, { id: 7 });

    expect(result._unsafeUnwrapErr().type).toBe('IndicatorSetNotFoundError');
  });
});

describe('deleteAllIndicatorSets', () => {
  it('reports how many sets were removed', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas, beloHorizonte]);

    expect((await deleteAllIndicatorSets({ indicatorRepo }))._unsafeUnwrap()).toBe(2);
    expect(indicatorRepo.counts().indicators).toBe(0);
  });

  it('reports 0 on an empty catalog', async () => {
    const result = await deleteAllIndicatorSets({ indicatorRepo: makeFakeIndicatorRepo() });

    expect(result._unsafeUnwrap()).toBe(0);
  });
});

describe('getIndicatorsByMunicipality', () => {
  it('finds the municipality by a case-insensitive fragment', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas, beloHorizonte]);

    const set = (
      await getIndicatorsByMunicipality({ indicatorRepo }, { name: 'horiz' })
    )._unsafeUnwrap();

    expect(set.id).toBe(2);
    expect(set.stateCode).toBe('MG');
  });

  it('returns the lowest id when several names match', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas, makeIndicatorSetDocument({ ano_edital: 2025 })]);

    const set = (
      await getIndicatorsByMunicipality({ indicatorRepo }, { name: 'CAMP' })
    )._unsafeUnwrap();

    expect(set.id).toBe(1);
  });

  it('returns not found when no name contains the fragment', async () => {
    const result = await getIndicatorsByMunicipality(
      { indicatorRepo: makeFakeIndicatorRepo() },
      { name: 'Recife' }
    );

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MunicipalityNotFoundError',
      message: "No municipality found containing 'Recife'",
      name: 'Recife',
    });
  });
});

describe('exportIndicatorSet', () => {
  it('produces the document it was imported from', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas]);

    const exported = (await exportIndicatorSet({ indicatorRepo }, { id: 1 }))._unsafeUnwrap();

    expect(exported).toEqual(campinas);
  });

  it('can be imported again under a different tender', async () => {
    const indicatorRepo = makeFakeIndicatorRepo();
    await seed(indicatorRepo, [campinas]);
    const exported = (await exportIndicatorSet({ indicatorRepo }, { id: 1 }))._unsafeUnwrap();

    const reimported = await importIndicatorSet(
      { indicatorRepo },
      { document: { ...exported, edital: 'PE-002/2024' } }
    );

    expect(reimported._unsafeUnwrap().indicators[0]?.subIndicators).toHaveLength(2);
  });

  it('returns not found for an unknown id', async () => {
    const result = await exportIndicatorSet({ indicatorRepo: makeFakeIndicatorRepo() }, { id: 5 });

    expect(result._unsafeUnwrapErr().type).toBe('IndicatorSetNotFoundError');
  });
});
