import express from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';

import { ANALYSIS_MODULES, Dispatcher, createDispatcher, createRegistry } from './analysis';
import { getDomain, hasDomain } from './catalog';
import { ingestTableBuffer } from './ingest/table';
import { ANALYSIS_TYPES, InsightClient } from './insights';
import { validateMapping } from './map/columns';
import { AnalysisPlan, buildPlan } from './plan';
import { Profiler, createProfiler, profileContext } from './profile';
import { Catalog, ColumnMapping, Dataset } from './types/schema';

export type AppDeps = {
  catalog: Catalog;
  insights: InsightClient;
  dispatcher?: Dispatcher;
  profiler?: Profiler;
  fuzzyMatchThreshold?: number;
};

type Session = { dataset: Dataset; plan: AnalysisPlan };

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

const errorMessage = (err: unknown, fallback: string) =>
  err instanceof Error && err.message ? err.message : fallback;

const mappingBody = z.object({
  mapping: z.record(z.unknown()).optional(),
  domain: z.string().min(1).optional()
});

const questionBody = z.object({
  question: z.string().optional(),
  params: z.record(z.unknown()).optional()
});

const insightBody = z.object({
  payload: z.record(z.unknown()),
  domain: z.string().min(1).default('general'),
  analysisType: z.enum(ANALYSIS_TYPES).default('business_insights')
});

export const createApp = (deps: AppDeps) => {
  const { catalog, insights } = deps;
  const dispatcher = deps.dispatcher ?? createDispatcher(createRegistry(ANALYSIS_MODULES), insights);
  const profiler = deps.profiler ?? createProfiler(catalog);
  const threshold = deps.fuzzyMatchThreshold;

  // one dataset per process, replaced on every upload
  let session: Session | null = null;

  const app = express();
  const upload = multer({ limits: { fileSize: MAX_UPLOAD_BYTES } });

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, catalogVersion: catalog.version, warnings: catalog.warnings });
  });

  app.get('/api/domains', (_req, res) => {
    res.json({
      domains: catalog.domains.map(d => ({
        id: d.id,
        name: d.name,
        description: d.description,
        fields: d.fields.map(f => f.name),
        tiers: d.tiers
      }))
    });
  });

  app.post('/api/datasets', upload.single('file'), (req, res) => {
    const file = req.file;
    if (!file) return res.status(400).json({ error: 'No file uploaded.' });

    const requested = typeof req.body?.domain === 'string' ? req.body.domain : undefined;
    if (requested && !hasDomain(catalog, requested)) {
      return res.status(400).json({ error: `Unknown domain: ${requested}` });
    }

    let dataset: Dataset;
    try {
      dataset = ingestTableBuffer(file.buffer, file.originalname);
    } catch (err: unknown) {
      return res.status(400).json({ error: errorMessage(err, 'Could not read the uploaded file') });
    }

    const plan = buildPlan(dataset, catalog, { domain: requested, threshold });
    profiler.clear();
    session = { dataset, plan };
    res.json(plan);
  });

  app.get('/api/datasets/current', (_req, res) => {
    if (!session) return res.status(400).json({ error: 'No dataset uploaded.' });
    res.json(session.plan);
  });

  app.post('/api/datasets/mapping', (req, res) => {
    if (!session) return res.status(400).json({ error: 'No dataset uploaded.' });
    if (session.plan.confirmed) {
      return res.status(409).json({ error: 'Mapping already confirmed. Upload the dataset again to change it.' });
    }

    const body = mappingBody.safeParse(req.body ?? {});
    if (!body.success) return res.status(400).json({ error: 'Invalid request body' });

    const domainId = body.data.domain ?? session.plan.domain.id;
    if (!hasDomain(catalog, domainId)) return res.status(400).json({ error: `Unknown domain: ${domainId}` });

    let mapping: ColumnMapping | undefined;
    if (body.data.mapping) {
      const checked = validateMapping(body.data.mapping, session.dataset.columns, getDomain(catalog, domainId));
      if (!checked.ok) return res.status(400).json({ error: 'Invalid mapping', details: checked.errors });
      mapping = checked.mapping;
    } else if (domainId === session.plan.domain.id) {
      mapping = session.plan.mapping;
    }

    const plan = buildPlan(session.dataset, catalog, { domain: domainId, mapping, threshold });
    session = { dataset: session.dataset, plan: { ...plan, confirmed: true } };
    res.json(session.plan);
  });

  app.get('/api/datasets/profile', (_req, res) => {
    if (!session) return res.status(400).json({ error: 'No dataset uploaded.' });
    try {
      res.json(profiler.profile(session.dataset, session.plan.domain.id));
    } catch (err: unknown) {
      res.status(500).json({ error: errorMessage(err, 'Profiling failed') });
    }
  });

  app.get('/api/datasets/profile/insights', async (_req, res) => {
    if (!session) return res.status(400).json({ error: 'No dataset uploaded.' });
    const { dataset, plan } = session;
    try {
      const profile = profiler.profile(dataset, plan.domain.id);
      const text = await insights.generate(profileContext(profile), plan.domain.id, 'pattern_recognition');
      res.json({ fingerprint: profile.fingerprint, text });
    } catch (err: unknown) {
      res.status(500).json({ error: errorMessage(err, 'Profile insights failed') });
    }
  });

  app.get('/api/questions/suggestions', async (_req, res) => {
    if (!session) return res.status(400).json({ error: 'No dataset uploaded.' });
    const { dataset, plan } = session;
    try {
      const questions = await insights.generateQuestions(
        { columns: dataset.columns, mappedFields: Object.keys(plan.mapping), rowCount: dataset.rows.length },
        plan.domain.id
      );
      res.json({ questions });
    } catch (err: unknown) {
      res.status(500).json({ error: errorMessage(err, 'Question suggestions failed') });
    }
  });

  app.post('/api/questions/:questionId', async (req, res) => {
    if (!session) return res.status(400).json({ error: 'No dataset uploaded.' });
    const body = questionBody.safeParse(req.body ?? {});
    if (!body.success) return res.status(400).json({ error: 'Invalid request body' });

    const { questionId } = req.params;
    const { dataset, plan } = session;
    try {
      const params = { ...body.data.params, ...(body.data.question ? { question: body.data.question } : {}) };
      const profile = profiler.profile(dataset, plan.domain.id);
      const result = await dispatcher.dispatch(
        questionId,
        dataset,
        plan.mapping,
        getDomain(catalog, plan.domain.id),
        params,
        profile
      );
      res.json({ questionId, registered: dispatcher.has(questionId), result });
    } catch (err: unknown) {
      res.status(500).json({ error: errorMessage(err, 'Analysis failed') });
    }
  });

  app.post('/api/insights', async (req, res) => {
    const body = insightBody.safeParse(req.body ?? {});
    if (!body.success) return res.status(400).json({ error: 'payload is required and analysisType must be known' });
    const { payload, domain, analysisType } = body.data;
    try {
      res.json({ text: await insights.generate(payload, domain, analysisType) });
    } catch (err: unknown) {
      res.status(500).json({ error: errorMessage(err, 'Insight generation failed') });
    }
  });

  app.get('/api/insights/cache', (_req, res) => {
    res.json(insights.cacheStats());
  });

  app.delete('/api/insights/cache', (_req, res) => {
    insights.clearCache();
    res.json({ ok: true });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = err instanceof multer.MulterError ? 400 : 500;
    res.status(status).json({ error: errorMessage(err, 'Request failed') });
  });

  return app;
};
