import { z } from 'zod'
import {
  DEFAULT_IGNORED_DIRECTORIES,
  DEFAULT_IGNORED_FILES,
  DEFAULT_SECRET_PATTERNS,
  DEFAULT_BINARY_EXTENSIONS,
  DEFAULT_TEXT_EXTENSIONS,
  DEFAULT_CONTENT_CAP_BYTES,
  DEFAULT_TEXT_OUTPUT_CAP_BYTES,
  DEFAULT_VCS_TIMEOUT_MS,
} from '../config/defaults'

const lowercased = z.array(z.string().min(1)).transform((values) =>
  values.map((value) => value.toLowerCase())
)

const positiveInt = z.number().int().positive()

// Config schema
export const CollectorConfigSchema = z.object({
  ignoredDirectories: z.array(z.string().min(1)).default(DEFAULT_IGNORED_DIRECTORIES),
  ignoredFiles: lowercased.default(DEFAULT_IGNORED_FILES),
  secretPatterns: lowercased.default(DEFAULT_SECRET_PATTERNS),
  binaryExtensions: lowercased.default(DEFAULT_BINARY_EXTENSIONS),
  textExtensions: lowercased.default(DEFAULT_TEXT_EXTENSIONS),
  sizeCaps: z.object({
    full: positiveInt.default(DEFAULT_CONTENT_CAP_BYTES),
    diff: positiveInt.default(DEFAULT_CONTENT_CAP_BYTES),
  }).default({
    full: DEFAULT_CONTENT_CAP_BYTES,
    diff: DEFAULT_CONTENT_CAP_BYTES,
  }),
  textOutput: z.object({
    maxBytesPerFile: positiveInt.default(DEFAULT_TEXT_OUTPUT_CAP_BYTES),
  }).default({
    maxBytesPerFile: DEFAULT_TEXT_OUTPUT_CAP_BYTES,
  }),
  vcs: z.object({
    timeoutMs: positiveInt.default(DEFAULT_VCS_TIMEOUT_MS),
  }).default({
    timeoutMs: DEFAULT_VCS_TIMEOUT_MS,
  }),
})
