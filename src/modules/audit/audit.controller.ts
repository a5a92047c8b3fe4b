/**
 * Audit Controller
 * HTTP request/response handling for audit endpoints
 */

import { Request, Response } from 'express';
import { auditService, AuditService } from './audit.service';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { IAuditListResponse, IAuditRunResponse, ICreateAuditRequest } from './audit.types';
import type { TrailingSlashPolicy } from '../../lib/crawling/crawling.types';

const NUMERIC_OVERRIDES = [
  'maxDepth',
  'maxPages',
  'concurrency',
  'perHostConcurrency',
  'crawlDelayFloorMs',
  'fetchTimeoutMs',
  'timeLimitMs',
] as const;

function isTrailingSlash(value: unknown): value is TrailingSlashPolicy {
  return value === 'strip' || value === 'add' || value === 'preserve';
}

/**
 * Validate the POST /api/audits body. Only keys present in the body are copied.
 */
export function parseCreateAuditRequest(body: unknown): ICreateAuditRequest {
  if (typeof body !== 'object' || body === null) {
    throw new ApiError(400, 'Request body must be a JSON object');
  }

  const fields = new Map<string, unknown>(Object.entries(body));
  const seedUrl = fields.get('seedUrl');
  if (typeof seedUrl !== 'string' || seedUrl.trim().length === 0) {
    throw new ApiError(400, 'seedUrl is required');
  }

  const request: ICreateAuditRequest = { seedUrl: seedUrl.trim() };
  const issues: string[] = [];

  for (const key of NUMERIC_OVERRIDES) {
    const value = fields.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`${key} must be a number`);
      continue;
    }
    request[key] = value;
  }

  const trailingSlash = fields.get('trailingSlash');
  if (trailingSlash !== undefined) {
    if (isTrailingSlash(trailingSlash)) {
      request.trailingSlash = trailingSlash;
    } else {
      issues.push('trailingSlash must be one of strip, add, preserve');
    }
  }

  const crawlResources = fields.get('crawlResources');
  if (crawlResources !== undefined) {
    if (typeof crawlResources === 'boolean') {
      request.crawlResources = crawlResources;
    } else {
      issues.push('crawlResources must be a boolean');
    }
  }

  const blockedPatterns = fields.get('blockedPatterns');
  if (blockedPatterns !== undefined) {
    if (Array.isArray(blockedPatterns) && blockedPatterns.every((p): p is string => typeof p === 'string')) {
      request.blockedPatterns = blockedPatterns;
    } else {
      issues.push('blockedPatterns must be an array of strings');
    }
  }

  if (issues.length > 0) {
    throw new ApiError(400, `Invalid audit request: ${issues.join('; ')}`, issues);
  }

  return request;
}

export class AuditController {
  constructor(private readonly service: AuditService = auditService) {}

  /**
   * POST /api/audits
   * Start a new audit run
   */
  createAudit = asyncHandler(async (req: Request, res: Response) => {
    const audit = await this.service.createAudit(parseCreateAuditRequest(req.body));

    const response: IAuditRunResponse = {
      success: true,
      audit,
    };

    res.status(201).json(response);
  });

  /**
   * GET /api/audits/:id
   * Get an audit run with its report once completed
   */
  getAudit = asyncHandler(async (req: Request, res: Response) => {
    const audit = await this.service.getAudit(req.params.id);

    if (!audit) {
      throw new ApiError(404, 'Audit not found');
    }

    const response: IAuditRunResponse = {
      success: true,
      audit,
    };

    res.json(response);
  });

  /**
   * GET /api/audits
   * Most recent audit runs
   */
  getAudits = asyncHandler(async (req: Request, res: Response) => {
    const requested = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
    const limit = Number.isNaN(requested) ? 20 : Math.min(Math.max(requested, 1), 100);

    const { audits, total } = await this.service.getRecentAudits(limit);

    const response: IAuditListResponse = {
      success: true,
      audits,
      total,
      limit,
    };

    res.json(response);
  });

  /**
   * POST /api/audits/:id/cancel
   * Cancel a running audit
   */
  cancelAudit = asyncHandler(async (req: Request, res: Response) => {
    const audit = await this.service.cancelAudit(req.params.id);

    if (!audit) {
      throw new ApiError(404, 'Audit not found');
    }

    const response: IAuditRunResponse = {
      success: true,
      audit,
    };

    res.json(response);
  });

  /**
   * DELETE /api/audits/:id
   * Delete an audit run
   */
  deleteAudit = asyncHandler(async (req: Request, res: Response) => {
    const deleted = await this.service.deleteAudit(req.params.id);

    if (!deleted) {
      throw new ApiError(404, 'Audit not found');
    }

    res.json({
      success: true,
      message: 'Audit deleted successfully',
    });
  });
}

export const auditController = new AuditController();
