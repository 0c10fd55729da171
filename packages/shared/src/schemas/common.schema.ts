import { z } from 'zod';
import { ErrorCode } from '../enums/index.js';

export const apiErrorSchema = z.object({
  error: z.object({
    code: z.nativeEnum(ErrorCode),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});
