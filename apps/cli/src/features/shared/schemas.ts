import { LOG_LEVELS } from '@txledger/logger';
import { z } from 'zod';

export const InputPathSchema = z.string().trim().min(1, 'Input path must not be empty');

/**
 * Process command options (commander camel-cases --log-level to logLevel)
 */
export const ProcessCommandOptionsSchema = z.object({
  lenient: z.boolean().optional(),
  logLevel: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS, { errorMap: () => ({ message: `Log level must be one of: ${LOG_LEVELS.join(', ')}` }) }))
    .optional(),
});
