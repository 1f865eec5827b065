import type { Express, Response } from 'express';
import type { Server } from 'http';
import { api } from '@shared/routes';
import { decodeImagePayload } from './image-input';
import { monitoring } from './monitoring';
import { getServiceAvailability, type ServiceRegistry } from './service-registry';

// Cancels the analysis when the client disconnects before the response is sent
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export function registerRoutes(httpServer: Server, app: Express, services: ServiceRegistry): Server {
  app.post(api.analysis.analyze.path, async (req, res, next) => {
    const parsed = api.analysis.analyze.input.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return res.status(400).json({ message: issue?.message ?? 'Invalid request', field: issue?.path.join('.') });
    }

    try {
      const { image, intelligentCrop, categoryFilter, limit } = parsed.data;
      const result = await services.pipeline.runCompleteAnalysis(
        decodeImagePayload(image),
        services.marketplaceSearch,
        { intelligentCrop, categoryFilter, limit, signal: abortOnDisconnect(res) }
      );
      monitoring.recordAnalysis(result.analysisSummary);
      res.status(200).json(result);
    } catch (err) {
      next(err);
    }
  });

  app.post(api.analysis.cropPreview.path, async (req, res, next) => {
    const parsed = api.analysis.cropPreview.input.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return res.status(400).json({ message: issue?.message ?? 'Invalid request', field: issue?.path.join('.') });
    }

    try {
      const preview = await services.pipeline.intelligentCropPreview(decodeImagePayload(parsed.data.image));
      res.status(200).json(preview);
    } catch (err) {
      next(err);
    }
  });

  app.get(api.system.aiStatus.path, (_req, res) => {
    res.status(200).json({
      services: getServiceAvailability(services),
      health: monitoring.getHealthStatus(),
    });
  });

  app.get(api.system.health.path, (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  return httpServer;
}
