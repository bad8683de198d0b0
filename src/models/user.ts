/**
 * User model.
 */

import { z } from 'zod';
import { idColumn, text } from './common.js';

export const UserSchema = z
  .object({
    user_id: z.number().int().positive(),
    name: text.refine((value) => value.length > 0, 'Name must not be empty'),
  })
  .strict();

export type User = z.infer<typeof UserSchema>;

/**
 * A user before an id has been assigned.
 */
export type NewUser = Omit<User, 'user_id'>;

/**
 * Column order of the users file.
 */
export const USER_COLUMNS = ['user_id', 'name'] as const;

/**
 * Decodes one raw row of the users file.
 */
export const UserRowSchema = z
  .tuple([idColumn, z.string()])
  .transform(([user_id, name]) => ({ user_id, name }))
  .pipe(UserSchema);
