import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { AccountService } from '../../../application/accounts/accountService.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { type AuthRequest, currentAccount, requestContext } from '../middleware/auth.js';
import { toUserPage, toUserProfile } from '../serializers.js';

/**
 * @openapi
 * /api/users/me:
 *   get:
 *     tags: [Users]
 *     summary: Profile of the authenticated user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserProfile' }
 *       401:
 *         description: Missing, invalid or expired token
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/me/password:
 *   put:
 *     tags: [Users]
 *     summary: Change the authenticated user's password
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [current_password, new_password]
 *             properties:
 *               current_password: { type: string }
 *               new_password: { type: string, minLength: 8 }
 *     responses:
 *       204: { description: Password changed }
 *       401:
 *         description: Unauthenticated or wrong current password
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users:
 *   get:
 *     tags: [Users]
 *     summary: List users (admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: skip
 *         schema: { type: integer, minimum: 0, default: 0 }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 200, default: 100 }
 *     responses:
 *       200: { description: OK }
 *       403:
 *         description: Admin privileges required
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Profile of a user by id
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserProfile' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Users]
 *     summary: Update a user's name, active flag or admin flag (admin)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               full_name: { type: string }
 *               is_active: { type: boolean }
 *               is_admin: { type: boolean }
 *     responses:
 *       200:
 *         description: Updated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserProfile' }
 *       403:
 *         description: Admin privileges required
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const userIdParamsSchema = z.object({
  id: z.string().uuid(),
});

const listUsersQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(200).default(100),
});

const changePasswordBodySchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(8),
});

const updateUserBodySchema = z
  .object({
    full_name: z.string().trim().min(1).optional(),
    is_active: z.boolean().optional(),
    is_admin: z.boolean().optional(),
  })
  .strict()
  .refine((body) => Object.keys(body).length > 0, {
    message: 'At least one field must be provided',
  });

export interface UserRouteServices {
  accounts: AccountService;
  authenticate: RequestHandler;
  requireAdmin: RequestHandler;
}

export function createUserRoutes({ accounts, authenticate, requireAdmin }: UserRouteServices) {
  const router = Router();

  // All routes require authentication
  router.use(authenticate);

  router.get(
    '/me',
    asyncHandler(async (req: AuthRequest, res) => {
      const account = currentAccount(req);
      const profile = await accounts.getProfile(account, account.id, requestContext(req));
      res.json(toUserProfile(profile));
    })
  );

  router.put(
    '/me/password',
    validate({ body: changePasswordBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const body = changePasswordBodySchema.parse(req.body);
      await accounts.changePassword(
        currentAccount(req),
        body.current_password,
        body.new_password,
        requestContext(req)
      );
      res.status(204).end();
    })
  );

  router.get(
    '/',
    requireAdmin,
    validate({ query: listUsersQuerySchema }),
    asyncHandler(async (req, res) => {
      const query = listUsersQuerySchema.parse(req.query);
      const page = await accounts.listAccounts(query);
      res.json(toUserPage(page));
    })
  );

  router.get(
    '/:id',
    validate({ params: userIdParamsSchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const profile = await accounts.getProfile(currentAccount(req), id, requestContext(req));
      res.json(toUserProfile(profile));
    })
  );

  router.patch(
    '/:id',
    requireAdmin,
    validate({ params: userIdParamsSchema, body: updateUserBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const { id } = userIdParamsSchema.parse(req.params);
      const body = updateUserBodySchema.parse(req.body);
      const updated = await accounts.updateAccount(
        currentAccount(req),
        id,
        { fullName: body.full_name, isActive: body.is_active, isAdmin: body.is_admin },
        requestContext(req)
      );
      res.json(toUserProfile(updated));
    })
  );

  return router;
}
