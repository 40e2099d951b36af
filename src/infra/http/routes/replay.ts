import express, { Router } from 'express';
import { z } from 'zod';
import { ReplayLedgerUseCase } from '../../../application/ledger/replay.js';
import { readCsv } from '../../csv/csvReader.js';
import { writeAccountsCsv } from '../../csv/csvWriter.js';
import type { AppConfig } from '../../config.js';

const replayQuerySchema = z.object({
  format: z.enum(['json', 'csv']).default('json'),
});

// The text parser leaves `{}` behind when the body is missing or not CSV
const replayBodySchema = z.string({
  invalid_type_error: 'Request body must be CSV text',
});

export function createReplayRoutes(config: AppConfig): Router {
  const router = Router();
  const replayUseCase = new ReplayLedgerUseCase();

  // Replay a transaction log and return the final account states
  router.post(
    '/replays',
    express.text({
      type: ['text/csv', 'text/plain'],
      limit: config.REPLAY_BODY_LIMIT,
    }),
    (req, res) => {
      const { format } = replayQuerySchema.parse(req.query);
      const csv = replayBodySchema.parse(req.body);

      const result = replayUseCase.execute({ records: readCsv(csv).records });

      if (format === 'csv') {
        res.setHeader('Content-Type', 'text/csv');
        res.setHeader('X-Replay-Warnings', String(result.warnings.length));
        res.send(writeAccountsCsv(result.accounts));
        return;
      }

      res.json(result);
    }
  );

  return router;
}
