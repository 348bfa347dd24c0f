/**
 * Indicators Module REST Routes
 *
 * - POST   /indicadores/importar           Import a document (JSON body or multipart "file")
 * - GET    /indicadores                    List, filtered
 * - GET    /indicadores/comparar           Equivalent indicators across municipalities
 * - GET    /indicadores/semelhantes        Groups of recurring formulas
 * - GET    /indicadores/por-municipio      Indicators of the first matching municipality
 * - GET    /indicadores/exportar/:id       Export as an import document
 * - GET    /indicadores/:id                Get one set
 * - PUT    /indicadores/:id                Replace municipality fields
 * - DELETE /indicadores/:id                Delete one set
 * - DELETE /indicadores                    Delete every set
 * - PATCH  /indicadores/:id/formula        Patch an indicator's formula
 * - PUT    /indicadores/:id/tags           Replace an indicator's tags
 */

import { ok, err, type Result } from 'neverthrow';

import {
  presentEquivalentIndicator,
  presentError,
  presentFormula,
  presentImportSummary,
  presentIndicator,
  presentIndicatorSet,
  presentSimilarGroups,
} from './presenters.js';
import {
  ByMunicipalityQuerySchema,
  ByMunicipalityResponseSchema,
  CompareIndicatorsQuerySchema,
  CompareResponseSchema,
  DeleteAllResponseSchema,
  DeleteIndicatorSetResponseSchema,
  ErrorResponseSchema,
  ExportedIndicatorSetSchema,
  FormulaResponseSchema,
  IdParamsSchema,
  ImportResponseSchema,
  IndicatorSetListResponseSchema,
  IndicatorSetResponseSchema,
  ListIndicatorSetsQuerySchema,
  ReplaceTagsBodySchema,
  SimilarIndicatorsQuerySchema,
  SimilarResponseSchema,
  TagsResponseSchema,
  UpdateFormulaQuerySchema,
  UpdateIndicatorSetBodySchema,
  type ByMunicipalityQuery,
  type CompareIndicatorsQuery,
  type IdParams,
  type ListIndicatorSetsQuery,
  type ReplaceTagsBody,
  type SimilarIndicatorsQuery,
  type UpdateFormulaQuery,
  type UpdateIndicatorSetBody,
} from './schemas.js';
import { decodeDocumentText } from '../../core/document.js';
import {
  createMalformedDocumentError,
  getHttpStatusForError,
  type IndicatorError,
  type MalformedDocumentError,
} from '../../core/errors.js';
import { compareIndicators } from '../../core/usecases/compare-indicators.js';
import { deleteAllIndicatorSets } from '../../core/usecases/delete-all-indicator-sets.js';
import { deleteIndicatorSet } from '../../core/usecases/delete-indicator-set.js';
import { exportIndicatorSet } from '../../core/usecases/export-indicator-set.js';
import { findSimilarIndicators } from '../../core/usecases/find-similar-indicators.js';
import { getIndicatorSet } from '../../core/usecases/get-indicator-set.js';
import { getIndicatorsByMunicipality } from '../../core/usecases/get-indicators-by-municipality.js';
import { importIndicatorSet } from '../../core/usecases/import-indicator-set.js';
import { listIndicatorSets } from '../../core/usecases/list-indicator-sets.js';
import { replaceTags } from '../../core/usecases/replace-tags.js';
import { updateFormula } from '../../core/usecases/update-formula.js';
import { updateIndicatorSet } from '../../core/usecases/update-indicator-set.js';

import type { IndicatorRepository } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for indicator routes.
 */
export interface MakeIndicatorRoutesDeps {
  indicatorRepo: IndicatorRepository;
}

/** Multipart field carrying the uploaded document */
export const UPLOAD_FIELD_NAME = 'file';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function sendError(reply: FastifyReply, error: IndicatorError) {
  return reply.status(getHttpStatusForError(error)).send(presentError(error));
}

/**
 * Reads the import document from a multipart upload or from the JSON body.
 */
async function readImportDocument(
  request: FastifyRequest
): Promise<Result<unknown, MalformedDocumentError>> {
  if (!request.isMultipart()) {
    return ok(request.body);
  }

  const file = await request.file();
  if (file?.fieldname !== UPLOAD_FIELD_NAME) {
    return err(
      createMalformedDocumentError(`Upload the document in the "${UPLOAD_FIELD_NAME}" field`)
    );
  }

  const buffer = await file.toBuffer();
  return decodeDocumentText(buffer.toString('utf8'));
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates indicator REST routes.
 */
export const makeIndicatorRoutes = (deps: MakeIndicatorRoutesDeps): FastifyPluginAsync => {
  const { indicatorRepo } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // POST /indicadores/importar - Import an indicator set
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post(
      '/indicadores/importar',
      {
        schema: {
          response: {
            200: ImportResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const documentResult = await readImportDocument(request);
        if (documentResult.isErr()) {
          return sendError(reply, documentResult.error);
        }

        const result = await importIndicatorSet(
          { indicatorRepo },
          { document: documentResult.value }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        request.log.info(
          { id: result.value.id, indicators: result.value.indicators.length },
          'Indicator set imported'
        );
        return reply.status(200).send({ ok: true, data: presentImportSummary(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /indicadores - List indicator sets
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ListIndicatorSetsQuery }>(
      '/indicadores',
      {
        schema: {
          querystring: ListIndicatorSetsQuerySchema,
          response: {
            200: IndicatorSetListResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { municipio, uf, edital, ano_edital } = request.query;

        const result = await listIndicatorSets(
          { indicatorRepo },
          { filter: { name: municipio, stateCode: uf, tenderId: edital, tenderYear: ano_edital } }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: result.value.map(presentIndicatorSet) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /indicadores/comparar - Find equivalent indicators
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: CompareIndicatorsQuery }>(
      '/indicadores/comparar',
      {
        schema: {
          querystring: CompareIndicatorsQuerySchema,
          response: {
            200: CompareResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await compareIndicators({ indicatorRepo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply
          .status(200)
          .send({ ok: true, data: result.value.map(presentEquivalentIndicator) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /indicadores/semelhantes - Group recurring formulas
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: SimilarIndicatorsQuery }>(
      '/indicadores/semelhantes',
      {
        schema: {
          querystring: SimilarIndicatorsQuerySchema,
          response: {
            200: SimilarResponseSchema,
            400: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await findSimilarIndicators(
          { indicatorRepo },
          { kind: request.query.criterio }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: presentSimilarGroups(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /indicadores/por-municipio - Indicators of a municipality
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: ByMunicipalityQuery }>(
      '/indicadores/por-municipio',
      {
        schema: {
          querystring: ByMunicipalityQuerySchema,
          response: {
            200: ByMunicipalityResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getIndicatorsByMunicipality(
          { indicatorRepo },
          { name: request.query.nome }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const set = result.value;
        return reply.status(200).send({
          ok: true,
          data: {
            id: set.id,
            municipio: set.name,
            uf: set.stateCode,
            total_indicadores: set.indicators.length,
            indicadores: set.indicators.map(presentIndicator),
          },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /indicadores/exportar/:id - Export as import document
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IdParams }>(
      '/indicadores/exportar/:id',
      {
        schema: {
          params: IdParamsSchema,
          response: {
            200: ExportedIndicatorSetSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await exportIndicatorSet({ indicatorRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send(result.value);
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /indicadores/:id - Get an indicator set
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Params: IdParams }>(
      '/indicadores/:id',
      {
        schema: {
          params: IdParamsSchema,
          response: {
            200: IndicatorSetResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await getIndicatorSet({ indicatorRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: presentIndicatorSet(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /indicadores/:id - Replace municipality fields
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: IdParams; Body: UpdateIndicatorSetBody }>(
      '/indicadores/:id',
      {
        schema: {
          params: IdParamsSchema,
          body: UpdateIndicatorSetBodySchema,
          response: {
            200: IndicatorSetResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { municipio, uf, edital, ano_edital } = request.body;

        const result = await updateIndicatorSet(
          { indicatorRepo },
          {
            id: request.params.id,
            fields: {
              name: municipio,
              stateCode: uf,
              tenderId: edital ?? null,
              tenderYear: ano_edital ?? null,
            },
          }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: presentIndicatorSet(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /indicadores/:id - Delete an indicator set
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete<{ Params: IdParams }>(
      '/indicadores/:id',
      {
        schema: {
          params: IdParamsSchema,
          response: {
            200: DeleteIndicatorSetResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await deleteIndicatorSet({ indicatorRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: { id: result.value.id, municipio: result.value.name },
        });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // DELETE /indicadores - Delete every indicator set
    // ─────────────────────────────────────────────────────────────────────────
    fastify.delete(
      '/indicadores',
      {
        schema: {
          response: {
            200: DeleteAllResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await deleteAllIndicatorSets({ indicatorRepo });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        request.log.warn({ deleted: result.value }, 'All indicator sets deleted');
        return reply.status(200).send({ ok: true, data: { removidos: result.value } });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PATCH /indicadores/:id/formula - Patch a formula
    // ─────────────────────────────────────────────────────────────────────────
    fastify.patch<{ Params: IdParams; Querystring: UpdateFormulaQuery }>(
      '/indicadores/:id/formula',
      {
        schema: {
          params: IdParamsSchema,
          querystring: UpdateFormulaQuerySchema,
          response: {
            200: FormulaResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const { bruta, normalizada, hash } = request.query;

        const result = await updateFormula(
          { indicatorRepo },
          { indicatorId: request.params.id, patch: { raw: bruta, normalized: normalizada, hash } }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({ ok: true, data: presentFormula(result.value) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // PUT /indicadores/:id/tags - Replace tags
    // ─────────────────────────────────────────────────────────────────────────
    fastify.put<{ Params: IdParams; Body: ReplaceTagsBody }>(
      '/indicadores/:id/tags',
      {
        schema: {
          params: IdParamsSchema,
          body: ReplaceTagsBodySchema,
          response: {
            200: TagsResponseSchema,
            400: ErrorResponseSchema,
            404: ErrorResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await replaceTags(
          { indicatorRepo },
          { indicatorId: request.params.id, tags: request.body }
        );
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        return reply.status(200).send({
          ok: true,
          data: { id: request.params.id, tags: result.value },
        });
      }
    );
  };
};
