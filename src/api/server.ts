import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import { ConfigurationError, describeError } from '../common/errors';
import { getLogger } from '../common/logger';
import { DetectorRegistry, detectorRegistry } from '../detectors/registry';
import { Match } from '../detectors/types';
import { Mapping } from '../engine/types';
import { PiiGuard } from '../guard/guard';
import { getMetricsSnapshot, metricsContentType, withSpan } from '../observability';
import { listPolicies } from '../policy/loader';
import { DetectionReport, buildDetectionReport } from '../reports/detection';

export interface ServerOptions {
  bodyLimit?: number;
  registry?: DetectorRegistry;
}

interface TextBody {
  text: string;
}

interface DetectBody extends TextBody {
  report?: boolean;
}

interface BatchBody {
  texts: string[];
}

interface DeanonymizeBody extends TextBody {
  mapping: Mapping;
}

const textSchema = { type: 'string', maxLength: 1_000_000 } as const;

const mappingSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const;

export function createServer(guard: PiiGuard, options: ServerOptions = {}): FastifyInstance {
  const log = getLogger('server');
  const registry = options.registry ?? detectorRegistry;
  const app = Fastify({ logger: false, ...(options.bodyLimit ? { bodyLimit: options.bodyLimit } : {}) });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      reply.status(400).send({ error: error.message });
      return;
    }
    if (error instanceof ConfigurationError || error instanceof RangeError) {
      reply.status(400).send({ error: error.message });
      return;
    }
    const status = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
    if (status >= 500) {
      log.error('Request failed', { method: request.method, url: request.url, error: describeError(error) });
    }
    reply.status(status).send({ error: error.message });
  });

  app.get('/health', async () => ({
    status: 'ok',
    policy: guard.policy.name,
    detectors: guard.detectors.map((detector) => detector.id),
    overlapStrategy: guard.overlapStrategy,
  }));

  app.get('/policies', async () => ({
    active: guard.policy.name,
    available: await listPolicies(),
  }));

  app.get('/detectors', async () => ({ detectors: registry.list() }));

  app.get('/metrics', async (request, reply) => {
    const metrics = await getMetricsSnapshot();
    reply.header('Content-Type', metricsContentType());
    reply.send(metrics);
  });

  app.post<{ Body: DetectBody }>(
    '/detect',
    {
      schema: {
        body: {
          type: 'object',
          required: ['text'],
          properties: { text: textSchema, report: { type: 'boolean' } },
        },
      },
    },
    async (request) => {
      const { text, report } = request.body;
      return withSpan(
        'http.detect',
        { 'text.length': text.length },
        async () => {
          const matches: Match[] = guard.detect(text);
          const response: { matches: Match[]; report?: DetectionReport } = { matches };
          if (report) {
            response.report = buildDetectionReport(text, matches, { includePreview: true });
          }
          return response;
        },
        (response) => ({ 'pii.entities': response.matches.length }),
      );
    },
  );

  app.post<{ Body: TextBody }>(
    '/anonymize',
    {
      schema: {
        body: { type: 'object', required: ['text'], properties: { text: textSchema } },
      },
    },
    async (request) => {
      const { text } = request.body;
      return withSpan(
        'http.anonymize',
        { 'text.length': text.length, policy: guard.policy.name },
        async () => guard.anonymize(text),
        (result) => ({ 'pii.placeholders': Object.keys(result.mapping).length }),
      );
    },
  );

  app.post<{ Body: BatchBody }>(
    '/anonymize/batch',
    {
      schema: {
        body: {
          type: 'object',
          required: ['texts'],
          properties: { texts: { type: 'array', items: textSchema, maxItems: 1000 } },
        },
      },
    },
    async (request) => {
      const { texts } = request.body;
      return withSpan(
        'http.anonymize.batch',
        { 'batch.size': texts.length, policy: guard.policy.name },
        async () => ({ results: guard.batchAnonymize(texts) }),
        ({ results }) => ({
          'pii.placeholders': results.reduce((total, result) => total + Object.keys(result.mapping).length, 0),
        }),
      );
    },
  );

  app.post<{ Body: DeanonymizeBody }>(
    '/deanonymize',
    {
      schema: {
        body: {
          type: 'object',
          required: ['text', 'mapping'],
          properties: { text: textSchema, mapping: mappingSchema },
        },
      },
    },
    async (request) => {
      const { text, mapping } = request.body;
      return withSpan('http.deanonymize', { 'text.length': text.length }, async () => ({
        text: guard.deanonymize(text, mapping),
      }));
    },
  );

  return app;
}
