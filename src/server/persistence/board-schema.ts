import { z } from 'zod';

export const BOARD_FILE_EXTENSION = '.board';

export const boardNameSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9_-]{1,64}$/, 'board name must be 1-64 letters, digits, "_" or "-"');

export const participantIdSchema = z
  .string()
  .trim()
  .min(1, 'participant id is required')
  .max(64, 'participant id is too long')
  .refine((id) => !/[\r\n]/.test(id), 'participant id must be a single line');

export const chatTextSchema = z.string().min(1, 'must not be empty');

export const singleLineSchema = z
  .string()
  .min(1, 'must not be empty')
  .refine((text) => !/[\r\n]/.test(text), 'must be a single line');
