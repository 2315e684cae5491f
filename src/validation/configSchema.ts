import { z } from 'zod';

const NonNegativeInteger = z
  .number({
    invalid_type_error: 'Value must be a number',
  })
  .int('Value must be an integer')
  .nonnegative('Value must be zero or positive');

/**
 * Shape of a configuration file on disk. Every section and field is optional
 * so a partial file can be merged over the defaults; unknown keys are dropped.
 */
export const StoredConfigurationSchema = z.object({
  version: z.string().optional(),
  lastUpdated: z.string().optional(),
  hostsFile: z
    .object({
      multiByteEncoding: z.boolean(),
      customPath: z.string().min(1),
      createBackups: z.boolean(),
      backupDirectory: z.string().min(1),
      maxBackups: NonNegativeInteger.max(1000),
      autoReloadOnExternalChanges: z.boolean(),
    })
    .partial()
    .optional(),
  system: z
    .object({
      alwaysUseElevatedPermissions: z.boolean(),
    })
    .partial()
    .optional(),
});

export type StoredConfiguration = z.infer<typeof StoredConfigurationSchema>;
