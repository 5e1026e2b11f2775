import jwt from 'jsonwebtoken';
import { env } from '../config/env';

export const generateToken = (
  id: string,
  secret: string = env.jwt.secret,
  expiresInSeconds: number = env.jwt.expiresInSeconds
): string => {
  return jwt.sign({ id }, secret, { expiresIn: expiresInSeconds });
};

/** Returns the user id carried by a token, or null if it is invalid or expired */
export const verifyToken = (token: string, secret: string = env.jwt.secret): string | null => {
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === 'string' || typeof decoded.id !== 'string') return null;
    return decoded.id;
  } catch {
    return null;
  }
};
