import { describe, it, expect } from 'vitest';

import {
  decodeDocumentText,
  parseIndicatorSetDocument,
  toExportedIndicatorSet,
} from '@/modules/indicators/core/document.js';

import { makeIndicatorDocument, makeIndicatorSetDocument } from '../../fixtures/builders.js';

import type { IndicatorSet } from '@/modules/indicators/core/types.js';

describe('parseIndicatorSetDocument', () => {
  it('builds the draft tree from a complete document', () => {
    const result = parseIndicatorSetDocument(makeIndicatorSetDocument());

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toEqual({
      name: 'Campinas',
      stateCode: 'SP',
      tenderId: 'PE-001/2024',
      tenderYear: 2024,
      indicators: [
        {
          name: 'Indice de Disponibilidade',
          description: 'Percentual de pontos acesos',
          unit: '%',
          tags: ['disponibilidade'],
          observations: [],
          inconsistencies: [],
          formula: { raw: 'PA / PT * 100', normalized: 'pa/pt*100', hash: 'hash-disp' },
          subIndicators: [
            { name: 'PA', description: 'Pontos acesos' },
            { name: 'PT', description: 'Pontos totais' },
          ],
          conditions: [
            { rule: '>= 98%', score: 10 },
            { rule: '< 98%', score: 0 },
          ],
        },
      ],
    });
  });

  it('accepts a document with only the required fields', () => {
    const result = parseIndicatorSetDocument({ municipio: 'Sobral', uf: 'CE' });

    expect(result._unsafeUnwrap()).toEqual({
      name: 'Sobral',
      stateCode: 'CE',
      tenderId: null,
      tenderYear: null,
      indicators: [],
    });
  });

  it('takes the indicator name from "nome" when "nome_indicador" is absent', () => {
    const result = parseIndicatorSetDocument({
      municipio: 'Sobral',
      uf: 'CE',
      indicadores: [{ nome: 'Tempo de Atendimento' }],
    });

    expect(result._unsafeUnwrap().indicators[0]?.name).toBe('Tempo de Atendimento');
  });

  it('treats null lists as empty and a null formula as no formula', () => {
    const result = parseIndicatorSetDocument({
      municipio: 'Sobral',
      uf: 'CE',
      indicadores: [
        {
          nome_indicador: 'Tempo de Atendimento',
          descricao: null,
          tags: null,
          observacoes: null,
          inconsistencias: null,
          formula: null,
          subindicadores: null,
          condicoes: null,
        },
      ],
    });

    expect(result._unsafeUnwrap().indicators[0]).toEqual({
      name: 'Tempo de Atendimento',
      description: null,
      unit: null,
      tags: [],
      observations: [],
      inconsistencies: [],
      formula: null,
      subIndicators: [],
      conditions: [],
    });
  });

  it('keeps an empty formula object and drops an absent one', () => {
    const result = parseIndicatorSetDocument({
      municipio: 'Sobral',
      uf: 'CE',
      indicadores: [{ nome_indicador: 'Sem formula' }, { nome_indicador: 'Vazia', formula: {} }],
    });

    expect(result._unsafeUnwrap().indicators.map((i) => i.formula)).toEqual([
      null,
      { raw: null, normalized: null, hash: null },
    ]);
  });

  it('rejects a tender year above the 32-bit integer range', () => {
    const result = parseIndicatorSetDocument({
      municipio: 'Sobral',
      uf: 'CE',
      ano_edital: 2_147_483_648,
    });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('MalformedDocumentError');
    if (error.type === 'MalformedDocumentError') {
      expect(error.details.some((detail) => detail.startsWith('/ano_edital'))).toBe(true);
    }
  });

  it('flattens grouped conditions in group order', () => {
    const result = parseIndicatorSetDocument({
      municipio: 'Sobral',
      uf: 'CE',
      indicadores: [
        {
          nome_indicador: 'Tempo de Atendimento',
          condicoes: {
            otimo: [{ regra: '<= 24h', nota: 10 }],
            regular: [
              { regra: '<= 48h', nota: 5 },
              { regra: '> 48h', nota: 0 },
            ],
          },
        },
      ],
    });

    expect(result._unsafeUnwrap().indicators[0]?.conditions).toEqual([
      { rule: '<= 24h', score: 10 },
      { rule: '<= 48h', score: 5 },
      { rule: '> 48h', score: 0 },
    ]);
  });

  it('rejects a document without municipio', () => {
    const result = parseIndicatorSetDocument({ uf: 'SP' });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MissingRequiredFieldError',
      message: 'Missing required field in document: municipio',
      field: 'municipio',
    });
  });

  it('rejects a blank uf as missing', () => {
    const result = parseIndicatorSetDocument({ municipio: 'Campinas', uf: '  ' });

    expect(result._unsafeUnwrapErr().type).toBe('MissingRequiredFieldError');
  });

  it('rejects the whole document when one indicator has no name', () => {
    const document = makeIndicatorSetDocument({
      indicadores: [makeIndicatorDocument(), { ...makeIndicatorDocument(), nome_indicador: '' }],
    });

    const result = parseIndicatorSetDocument(document);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MissingRequiredFieldError',
      message: 'Missing required field in document: indicadores[1].nome_indicador',
      field: 'indicadores[1].nome_indicador',
    });
  });

  it('rejects a sub-indicator without name', () => {
    const result = parseIndicatorSetDocument({
      municipio: 'Campinas',
      uf: 'SP',
      indicadores: [{ nome_indicador: 'Disponibilidade', subindicadores: [{ descricao: 'x' }] }],
    });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('MissingRequiredFieldError');
    expect(error.message).toBe(
      'Missing required field in document: indicadores[0].subindicadores[0].nome'
    );
  });

  it('reports values of the wrong type with their path', () => {
    const result = parseIndicatorSetDocument({
      municipio: 'Campinas',
      uf: 'SP',
      ano_edital: 'dois mil',
    });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('MalformedDocumentError');
    expect(error.message).toBe('Document has invalid field values');
    if (error.type === 'MalformedDocumentError') {
      expect(error.details.some((detail) => detail.startsWith('/ano_edital'))).toBe(true);
    }
  });

  it('rejects a state code that is not two letters long', () => {
    const result = parseIndicatorSetDocument({ municipio: 'Campinas', uf: 'SPX' });

    expect(result._unsafeUnwrapErr().type).toBe('MalformedDocumentError');
  });

  it('rejects a document that is not an object', () => {
    const result = parseIndicatorSetDocument([{ municipio: 'Campinas' }]);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MalformedDocumentError',
      message: 'Document must be a JSON object',
      details: [],
    });
  });
});

describe('decodeDocumentText', () => {
  it('parses JSON text', () => {
    expect(decodeDocumentText('{"municipio":"Campinas"}')._unsafeUnwrap()).toEqual({
      municipio: 'Campinas',
    });
  });

  it('rejects text that is not JSON', () => {
    const error = decodeDocumentText('{municipio')._unsafeUnwrapErr();

    expect(error.type).toBe('MalformedDocumentError');
    expect(error.message).toBe('Document is not valid JSON');
    expect(error.details).toHaveLength(1);
  });
});

describe('toExportedIndicatorSet', () => {
  it('writes the document field names', () => {
    const set: IndicatorSet = {
      id: 3,
      name: 'Sobral',
      stateCode: 'CE',
      tenderId: null,
      tenderYear: 2023,
      indicators: [
        {
          id: 11,
          municipalityId: 3,
          name: 'Tempo de Atendimento',
          description: null,
          unit: 'h',
          tags: ['sla'],
          observations: ['medido em horas'],
          inconsistencies: [],
          formula: null,
          subIndicators: [{ id: 5, indicatorId: 11, name: 'TA', description: null }],
          conditions: [{ id: 8, indicatorId: 11, rule: '<= 24h', score: 10 }],
        },
      ],
    };

    expect(toExportedIndicatorSet(set)).toEqual({
      municipio: 'Sobral',
      uf: 'CE',
      edital: null,
      ano_edital: 2023,
      indicadores: [
        {
          nome_indicador: 'Tempo de Atendimento',
          descricao: null,
          unidade: 'h',
          tags: ['sla'],
          observacoes: ['medido em horas'],
          inconsistencias: [],
          formula: null,
          subindicadores: [{ nome: 'TA', descricao: null }],
          condicoes: [{ regra: '<= 24h', nota: 10 }],
        },
      ],
    });
  });
});
