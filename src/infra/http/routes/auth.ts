import { Router } from 'express';
import { z } from 'zod';
import type { LoginUseCase } from '../../../application/auth/login.js';
import type { RegisterUseCase } from '../../../application/auth/register.js';
import type { RateLimiters } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { requestContext } from '../middleware/auth.js';
import { toTokenResponse, toUserProfile } from '../serializers.js';

/**
 * @openapi
 * /api/auth/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, full_name, password]
 *             properties:
 *               email: { type: string, format: email }
 *               full_name: { type: string, minLength: 1 }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserProfile' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/auth/login:
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a bearer token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 access_token: { type: string }
 *                 token_type: { type: string, example: bearer }
 *                 expires_in: { type: integer, example: 1800 }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Invalid credentials or inactive account
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       429:
 *         description: Too many login attempts
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export const registerBodySchema = z.object({
  email: z.string().trim().email(),
  full_name: z.string().trim().min(1),
  password: z.string().min(8),
});

export const loginBodySchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export interface AuthRouteServices {
  register: RegisterUseCase;
  login: LoginUseCase;
  limiters: RateLimiters;
}

export function createAuthRoutes({ register, login, limiters }: AuthRouteServices) {
  const router = Router();

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      const account = await register.execute(
        { email: body.email, fullName: body.full_name, password: body.password },
        requestContext(req)
      );
      res.status(201).json(toUserProfile(account));
    })
  );

  router.post(
    '/login',
    limiters.login,
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await login.execute(body, requestContext(req));
      res.status(200).json(toTokenResponse(result));
    })
  );

  return router;
}
