import express, { Request, Response } from 'express';
import { body, validationResult } from 'express-validator';
import { UserRepository } from '../store/types';
import { generateToken } from '../utils/generateToken';
import { comparePassword, hashPassword } from '../utils/password';
import { toAccountResponse } from '../utils/sanitizeUser';
import { protect, AuthRequest } from '../middleware/auth';
import { sendError } from '../middleware/errorHandler';

export interface AuthRoutesDeps {
  users: UserRepository;
  jwtSecret?: string;
}

export default function authRoutes({ users, jwtSecret }: AuthRoutesDeps) {
  const router = express.Router();

  // @route   POST /api/auth/register
  // @desc    Register a customer account
  // @access  Public
  router.post(
    '/register',
    [
      body('email').isEmail().normalizeEmail(),
      body('password').isLength({ min: 6 }),
      body('firstName').trim().notEmpty(),
      body('lastName').trim().notEmpty(),
    ],
    async (req: Request, res: Response) => {
      try {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
          return res.status(400).json({ errors: errors.array() });
        }

        const email = String(req.body.email);
        const userExists = await users.findByEmail(email);
        if (userExists) {
          return res.status(400).json({ message: 'User already exists' });
        }

        const user = await users.create({
          email,
          passwordHash: await hashPassword(String(req.body.password)),
          firstName: String(req.body.firstName),
          lastName: String(req.body.lastName),
          role: 'customer',
        });

        res.status(201).json({
          ...toAccountResponse(user),
          token: generateToken(user.id, jwtSecret),
        });
      } catch (error) {
        sendError(res, error);
      }
    }
  );

  // @route   POST /api/auth/login
  // @desc    Login user
  // @access  Public
  router.post(
    '/login',
    [body('email').isEmail().normalizeEmail(), body('password').notEmpty()],
    async (req: Request, res: Response) => {
      try {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
          return res.status(400).json({ errors: errors.array() });
        }

        const user = await users.findByEmail(String(req.body.email));
        if (!user || !(await comparePassword(String(req.body.password), user.passwordHash))) {
          return res.status(401).json({ message: 'Invalid credentials' });
        }

        res.json({
          ...toAccountResponse(user),
          token: generateToken(user.id, jwtSecret),
        });
      } catch (error) {
        sendError(res, error);
      }
    }
  );

  // @route   GET /api/auth/me
  // @desc    Current user
  // @access  Private
  router.get('/me', protect(users, jwtSecret), async (req: AuthRequest, res: Response) => {
    if (!req.user) {
      return res.status(401).json({ message: 'Not authorized' });
    }
    res.json(toAccountResponse(req.user));
  });

  return router;
}
