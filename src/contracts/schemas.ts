import { z } from 'zod'

export const EncodingSchema = z.enum([
  'utf8',
  'utf-8',
  'utf16le',
  'latin1',
  'ascii',
])

// Config schema
export const LangDiffConfigSchema = z.object({
  source: z.object({
    path: z.string().min(1).optional(),
    encoding: EncodingSchema.default('utf8'),
  }).default({
    encoding: 'utf8',
  }),
  output: z.object({
    dumpDir: z.string().min(1).default('dumps'),
    logDir: z.string().min(1).default('logs'),
    dumpPrefix: z.string().default('ru_lang_'),
    logPrefix: z.string().default('log_'),
  }).default({
    dumpDir: 'dumps',
    logDir: 'logs',
    dumpPrefix: 'ru_lang_',
    logPrefix: 'log_',
  }),
  analysis: z.object({
    itemPrefix: z.string().min(1).default('item'),
  }).default({
    itemPrefix: 'item',
  }),
})
