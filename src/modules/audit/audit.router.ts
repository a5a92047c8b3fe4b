/**
 * Audit Router
 * Route definitions for audit endpoints
 */

import { Router } from 'express';
import { auditController, AuditController } from './audit.controller';

export const createAuditRouter = (controller: AuditController = auditController): Router => {
  const router = Router();

  /**
   * @route   POST /api/audits
   * @desc    Start a new audit run
   */
  router.post('/', controller.createAudit);

  /**
   * @route   GET /api/audits
   * @desc    List recent audit runs
   */
  router.get('/', controller.getAudits);

  /**
   * @route   GET /api/audits/:id
   * @desc    Get an audit run and its report
   */
  router.get('/:id', controller.getAudit);

  /**
   * @route   POST /api/audits/:id/cancel
   * @desc    Cancel a running audit
   */
  router.post('/:id/cancel', controller.cancelAudit);

  /**
   * @route   DELETE /api/audits/:id
   * @desc    Delete an audit run
   */
  router.delete('/:id', controller.deleteAudit);

  return router;
};

export default createAuditRouter;
