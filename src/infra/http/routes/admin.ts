import { Router, RequestHandler } from 'express';
import { z } from 'zod';
import type { Services } from '../../services.js';
import { authMiddleware, requireRole } from '../middleware/auth.js';
import { usageMiddleware } from '../middleware/usage.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/admin/users:
 *   get:
 *     tags: [Admin]
 *     summary: List all users, newest first (admin only)
 *     security: [{ bearerAuth: [] }, { apiKeyAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/admin/users/{id}/toggle:
 *   post:
 *     tags: [Admin]
 *     summary: Activate or deactivate a user (admin only)
 *     security: [{ bearerAuth: [] }, { apiKeyAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200: { description: New activation state }
 *       403:
 *         description: Not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/admin/usage-stats:
 *   get:
 *     tags: [Admin]
 *     summary: Aggregate API usage over the last N days (admin only)
 *     security: [{ bearerAuth: [] }, { apiKeyAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: days
 *         schema: { type: integer, minimum: 1, maximum: 365, default: 7 }
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const toggleParamsSchema = z.object({
  id: z.string().min(1),
});

const usageStatsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

export function createAdminRoutes(services: Services) {
  const router = Router();

  // Per route rather than router.use, so usage sees the matched route pattern
  const adminOnly: RequestHandler[] = [
    usageMiddleware(services.usageRecorder),
    authMiddleware(services.accessControl),
    requireRole(services.accessControl, 'admin'),
  ];

  router.get(
    '/users',
    ...adminOnly,
    asyncHandler(async (_req, res) => {
      const users = await services.listUsers.execute();
      res.json({ count: users.length, users });
    })
  );

  router.post(
    '/users/:id/toggle',
    ...adminOnly,
    validate({ params: toggleParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = toggleParamsSchema.parse(req.params);
      const result = await services.toggleActive.execute(id);
      res.json(result);
    })
  );

  router.get(
    '/usage-stats',
    ...adminOnly,
    asyncHandler(async (req, res) => {
      const { days } = usageStatsQuerySchema.parse(req.query);
      const result = await services.usageStats.execute(days);
      res.json(result);
    })
  );

  return router;
}
