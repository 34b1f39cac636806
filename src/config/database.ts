import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { config } from './env';
import logger from './logger';
import { ConfigError } from '../utils/errors';

/**
 * Supabase database client singleton
 * Uses service role key for server-side operations
 */
let supabaseClient: SupabaseClient | null = null;

export function isDatabaseConfigured(): boolean {
  return Boolean(config.SUPABASE_URL && config.SUPABASE_SERVICE_ROLE_KEY);
}

/**
 * Get (and lazily create) the Supabase client
 * @throws {ConfigError} If the Supabase credentials are not configured
 */
export function getDatabase(): SupabaseClient {
  if (!supabaseClient) {
    if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
      throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set');
    }

    supabaseClient = createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
        detectSessionInUrl: false,
      },
      db: {
        schema: 'public',
      },
      global: {
        headers: {
          'x-application-name': 'voice-booking-intake',
        },
      },
    });

    logger.info('Supabase client initialized');
  }

  return supabaseClient;
}

/**
 * Drop the client reference (for graceful shutdown)
 * Supabase talks plain HTTP, so there is no connection to close
 */
export async function closeDatabase(): Promise<void> {
  if (supabaseClient) {
    supabaseClient = null;
    logger.info('Supabase client released');
  }
}

/**
 * Health check for database connectivity
 */
export async function checkDatabaseHealth(): Promise<boolean> {
  try {
    const db = getDatabase();
    const { error } = await db.from('appointments').select('id').limit(1);

    if (error) {
      logger.error({ err: error }, 'Database health check failed');
      return false;
    }

    return true;
  } catch (error) {
    logger.error({ err: error }, 'Database health check error');
    return false;
  }
}

export default getDatabase;
