/**
 * User repository for database operations
 * Users are keyed by E.164 phone (unique column)
 */

import { SupabaseClient } from '@supabase/supabase-js';
import getDatabase from '../config/database';
import { createChildLogger } from '../config/logger';
import { DatabaseError } from '../utils/errors';
import { maskPhoneNumber } from '../utils/phone.utils';
import { userRowSchema } from '../schemas/user.schema';
import type { User, UserRepository } from '../types/booking.types';

const NO_ROWS = 'PGRST116';
const UNIQUE_VIOLATION = '23505';

export class SupabaseUserRepository implements UserRepository {
  private log = createChildLogger({ repository: 'user' });

  constructor(private readonly database: () => SupabaseClient = getDatabase) {}

  private get db(): SupabaseClient {
    return this.database();
  }

  /**
   * Find or create user by phone number
   * A concurrent insert for the same phone is resolved by re-reading the winner
   * @param phone - E.164 phone number
   * @param fullName - Name collected during the call
   */
  async upsertByPhone(phone: string, fullName: string): Promise<User> {
    const existing = await this.findByPhone(phone);
    if (existing) {
      return existing;
    }

    const { data, error } = await this.db
      .from('users')
      .insert({ phone, full_name: fullName })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        const winner = await this.findByPhone(phone);
        if (winner) {
          return winner;
        }
      }
      this.log.error({ err: error, phone: maskPhoneNumber(phone) }, 'Failed to create user');
      throw new DatabaseError('Failed to create user');
    }

    const user = this.toUser(data);
    this.log.info({ userId: user.id, phone: maskPhoneNumber(phone) }, 'New user created');
    return user;
  }

  /**
   * Find user by phone number
   * @param phone - Phone number (E.164 format)
   */
  async findByPhone(phone: string): Promise<User | null> {
    const { data, error } = await this.db
      .from('users')
      .select('*')
      .eq('phone', phone)
      .single();

    if (error) {
      if (error.code === NO_ROWS) {
        return null;
      }
      this.log.error({ err: error, phone: maskPhoneNumber(phone) }, 'Failed to find user by phone');
      throw new DatabaseError('Failed to find user');
    }

    return this.toUser(data);
  }

  private toUser(row: unknown): User {
    const parsed = userRowSchema.safeParse(row);
    if (!parsed.success) {
      this.log.error({ issues: parsed.error.errors }, 'Unexpected users row shape');
      throw new DatabaseError('Unexpected users row shape');
    }
    return parsed.data;
  }
}
