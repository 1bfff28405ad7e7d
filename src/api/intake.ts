import { Router } from 'express';
import type { Container } from '../container.js';
import { logger } from '../lib/logger.js';
import { sendError } from './middleware.js';

const log = logger.child('[api/intake]');

// Public outage form
export function intakeApi(container: Container): Router {
  const { webForm } = container;
  const router = Router();

  router.post('/api/submit_power_outage', async (req, res) => {
    try {
      const result = await webForm.submit(req.body);
      if (result.kind === 'duplicate') {
        res.json({
          success: true,
          duplicate: true,
          reference_no: result.identifier,
          message: 'This outage was already reported today. Our team is already working on it.',
        });
        return;
      }
      const { complaint, jobOrderId } = result;
      res.json({
        success: true,
        duplicate: false,
        report_id: complaint.recordId,
        display_id: complaint.displayId,
        reference_no: complaint.referenceNo,
        job_order_id: jobOrderId,
        priority: complaint.priority,
        message: 'Report submitted successfully',
      });
    } catch (e) {
      sendError(res, e, log);
    }
  });

  return router;
}
