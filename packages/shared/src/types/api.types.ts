import type { z } from 'zod';
import type { apiErrorSchema } from '../schemas/common.schema.js';

export type ApiErrorResponse = z.infer<typeof apiErrorSchema>;
