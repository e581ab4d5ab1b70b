import session from 'express-session';
import connectPgSimple from 'connect-pg-simple';
import { randomBytes } from 'crypto';
import type { Express } from 'express';
import type { AppConfig } from './config';
import { pool } from './db';
import { logger } from './logger';

const PgSession = connectPgSimple(session);

export function setupSession(app: Express, appConfig: AppConfig) {
  if (!appConfig.SESSION_SECRET) {
    if (appConfig.NODE_ENV === 'production') {
      throw new Error('SESSION_SECRET must be set in production');
    }
    logger.warn('SESSION_SECRET not set - using a generated secret; sessions will not survive a restart');
  }

  const secret = appConfig.SESSION_SECRET || randomBytes(32).toString('hex');

  app.use(
    session({
      store: pool
        ? new PgSession({
            pool,
            tableName: 'user_sessions',
            createTableIfMissing: true,
          })
        : undefined,
      secret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        secure: appConfig.NODE_ENV === 'production',
        httpOnly: true,
        maxAge: 24 * 60 * 60 * 1000,
        sameSite: 'lax',
      },
      name: 'intake.sid',
    })
  );
}
