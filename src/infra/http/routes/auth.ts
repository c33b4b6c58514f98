import { Router, RequestHandler } from 'express';
import { z } from 'zod';
import type { Services } from '../../services.js';
import { authMiddleware, principalOf, AuthRequest } from '../middleware/auth.js';
import { usageMiddleware } from '../middleware/usage.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { UnauthorizedError } from '../../../application/errors.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive the first API key
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *               company: { type: string }
 *               fullName: { type: string }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error, weak password or invalid email
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Username or email already taken
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login with username or email and receive an access/refresh token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [identifier, password]
 *             properties:
 *               identifier: { type: string, description: Username or email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       403:
 *         description: Account deactivated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /api/auth/refresh:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange a refresh token for a new access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [refreshToken]
 *             properties:
 *               refreshToken: { type: string }
 *     responses:
 *       200: { description: New access token }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/logout:
 *   post:
 *     tags: [Auth]
 *     summary: Revoke the presented access token (and optionally a refresh token)
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               refreshToken: { type: string }
 *     responses:
 *       200: { description: Logged out }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/profile:
 *   get:
 *     tags: [Auth]
 *     summary: Current user's profile and today's API call count
 *     security: [{ bearerAuth: [] }, { apiKeyAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/change-password:
 *   post:
 *     tags: [Auth]
 *     summary: Change the current user's password
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [currentPassword, newPassword]
 *             properties:
 *               currentPassword: { type: string }
 *               newPassword: { type: string }
 *     responses:
 *       200: { description: Password changed }
 *       400:
 *         description: Weak new password
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized or wrong current password
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/regenerate-api-key:
 *   post:
 *     tags: [Auth]
 *     summary: Issue a new API key; the previous key stops working immediately
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: New API key }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const registerBodySchema = z.object({
  username: z.string().trim().min(3).max(50),
  // Format is checked by the use case so it can report INVALID_EMAIL
  email: z.string().trim().min(1).max(254),
  password: z.string().min(1).max(256),
  company: z.string().trim().max(100).optional(),
  fullName: z.string().trim().max(100).optional(),
});

const loginBodySchema = z.object({
  identifier: z.string().trim().min(1),
  password: z.string().min(1),
});

const refreshBodySchema = z.object({
  refreshToken: z.string().min(1),
});

const logoutBodySchema = z.object({
  refreshToken: z.string().min(1).optional(),
});

const changePasswordBodySchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(1).max(256),
});

export function createAuthRoutes(services: Services, loginRateLimiter: RequestHandler) {
  const router = Router();
  const protect: RequestHandler[] = [
    usageMiddleware(services.usageRecorder),
    authMiddleware(services.accessControl),
  ];

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const result = await services.register.execute(body);
      res.status(201).json(result);
    })
  );

  router.post(
    '/login',
    loginRateLimiter,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await services.login.execute(body);
      res.status(200).json(result);
    })
  );

  router.post(
    '/refresh',
    validate({ body: refreshBodySchema }),
    asyncHandler(async (req, res) => {
      const body = refreshBodySchema.parse(req.body);
      const result = await services.refresh.execute(body.refreshToken);
      res.status(200).json(result);
    })
  );

  router.post(
    '/logout',
    ...protect,
    validate({ body: logoutBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const body = logoutBodySchema.parse(req.body);
      const credential = req.credential;
      if (credential?.kind !== 'bearer') {
        throw new UnauthorizedError('Logout requires a bearer token');
      }
      await services.logout.execute(principalOf(req), {
        accessToken: credential.token,
        refreshToken: body.refreshToken,
      });
      res.status(200).json({ message: 'Logged out' });
    })
  );

  router.get(
    '/profile',
    ...protect,
    asyncHandler(async (req: AuthRequest, res) => {
      const result = await services.profile.execute(principalOf(req).userId);
      res.json(result);
    })
  );

  router.post(
    '/change-password',
    ...protect,
    validate({ body: changePasswordBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const body = changePasswordBodySchema.parse(req.body);
      await services.changePassword.execute({
        userId: principalOf(req).userId,
        currentPassword: body.currentPassword,
        newPassword: body.newPassword,
      });
      res.json({ message: 'Password changed' });
    })
  );

  router.post(
    '/regenerate-api-key',
    ...protect,
    asyncHandler(async (req: AuthRequest, res) => {
      const result = await services.regenerateApiKey.execute(principalOf(req).userId);
      res.json(result);
    })
  );

  return router;
}
