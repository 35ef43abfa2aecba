import { z } from 'zod';

export const FieldTypeSchema = z.enum(['number', 'string', 'text', 'boolean', 'date']);

function isLocale(value: string): boolean {
  try {
    return Intl.getCanonicalLocales(value).length === 1;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

export const LocaleSchema = z.string().refine(isLocale, value => ({
  message: `"${value}" is not a valid BCP 47 locale tag`,
}));

// "-" and "," belong to the --by syntax ("byYear,-byName")
export const OrderingNameSchema = z
  .string()
  .regex(/^[^-,\s][^,]*$/, 'Ordering names must not be empty, start with "-" or whitespace, or contain ","');

export const FieldOrderingSchema = z.object({
  // Dot path into the record, e.g. "meta.year"
  field: z.string().min(1),
  type: FieldTypeSchema.default('string'),
  direction: z.enum(['asc', 'desc']).default('asc'),
  nulls: z.enum(['first', 'last']).optional(),
  locale: LocaleSchema.optional(),
});

export const OrderingDefinitionSchema = z.object({
  description: z.string().optional(),
  keys: z.array(FieldOrderingSchema).min(1),
});

export const ConfigSchema = z
  .object({
    version: z.string().default('1.0.0'),
    locale: LocaleSchema.default('en'),
    default_ordering: z.string().min(1).optional(),
    orderings: z.record(OrderingNameSchema, OrderingDefinitionSchema).default({}),
  })
  .superRefine((config, ctx) => {
    if (config.default_ordering === undefined) return;
    for (const token of config.default_ordering.split(',')) {
      const name = token.trim().replace(/^-/, '');
      if (name.length > 0 && !Object.hasOwn(config.orderings, name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['default_ordering'],
          message: `Unknown ordering "${name}"`,
        });
      }
    }
  });

export type FieldType = z.infer<typeof FieldTypeSchema>;
export type FieldOrderingSpec = z.infer<typeof FieldOrderingSchema>;
export type OrderingDefinition = z.infer<typeof OrderingDefinitionSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(data: unknown): Config {
  return ConfigSchema.parse(data ?? {});
}
