// Pipeline routes: run, order and validate a snapshot sent by the canvas
import type { FastifyPluginAsync } from 'fastify';
import {
  Pipeline,
  PipelineSnapshotSchema,
  UnknownNodeTypeError,
  formatIssues,
  validateSnapshot,
  type ExecutionResults,
  type LoadedPipeline,
} from '@nodeflow/core';

/** Runtime id -> snapshot id. */
function invert(idMap: Map<string, string>): Map<string, string> {
  return new Map([...idMap].map(([snapshotId, runtimeId]) => [runtimeId, snapshotId]));
}

type LoadOutcome =
  | { ok: true; loaded: LoadedPipeline }
  | { ok: false; body: { error: string; message?: string; issues?: string[] } };

export const pipelineRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * Build a pipeline from a request body. Schema failures and unknown node
   * types come back as a 400 payload; anything else propagates.
   */
  function load(body: unknown): LoadOutcome {
    const parsed = PipelineSnapshotSchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, body: { error: 'Invalid pipeline snapshot', issues: formatIssues(parsed.error) } };
    }

    try {
      return { ok: true, loaded: Pipeline.fromSnapshot(parsed.data, fastify.factory, { logger: fastify.engineLog }) };
    } catch (error) {
      if (error instanceof UnknownNodeTypeError) {
        return { ok: false, body: { error: 'Invalid pipeline snapshot', message: error.message } };
      }
      throw error;
    }
  }

  /**
   * POST /api/v1/pipelines/execute - Run a snapshot, results keyed by snapshot node ids
   */
  fastify.post('/v1/pipelines/execute', async (request, reply) => {
    const outcome = load(request.body);
    if (!outcome.ok) {
      return reply.status(400).send(outcome.body);
    }
    const { pipeline, idMap } = outcome.loaded;

    try {
      const report = pipeline.execute();
      const toSnapshotId = invert(idMap);
      const results: ExecutionResults = {};
      for (const [runtimeId, result] of Object.entries(report.results)) {
        results[toSnapshotId.get(runtimeId) ?? runtimeId] = result;
      }
      return {
        complete: report.complete,
        results,
        order: report.order.map((id) => toSnapshotId.get(id) ?? id),
      };
    } catch (error) {
      fastify.log.error(error);
      return reply.status(500).send({
        error: 'Pipeline execution failed',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  /**
   * POST /api/v1/pipelines/order - Topological order in snapshot node ids
   */
  fastify.post('/v1/pipelines/order', async (request, reply) => {
    const outcome = load(request.body);
    if (!outcome.ok) {
      return reply.status(400).send(outcome.body);
    }

    const toSnapshotId = invert(outcome.loaded.idMap);
    return { order: outcome.loaded.pipeline.getExecutionOrder().map((id) => toSnapshotId.get(id) ?? id) };
  });

  /**
   * POST /api/v1/pipelines/validate - Structural and catalog checks; problems are reported, never a 4xx
   */
  fastify.post('/v1/pipelines/validate', async (request) => {
    return validateSnapshot(request.body, fastify.factory);
  });
};
