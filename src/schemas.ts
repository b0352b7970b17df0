/**
 * Zod schemas for installer configuration
 */

import { isAbsolute } from 'path';
import { z } from 'zod';

// Plain command / package names only: these reach `sh -c` and apt-get.
export const COMMAND_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;
export const PACKAGE_NAME_PATTERN = /^[a-z0-9][a-z0-9.+-]*$/;
const INTERPRETER_PATTERN = /^[A-Za-z0-9._+/-]+$/;

const absolutePath = z
  .string()
  .min(1)
  .refine(value => isAbsolute(value), { message: 'must be an absolute path' });

export const DependencySpecSchema = z.object({
  command: z.string().regex(COMMAND_NAME_PATTERN, 'must be a plain command name'),
  package: z.string().regex(PACKAGE_NAME_PATTERN, 'must be a valid apt package name'),
  label: z.string().min(1)
});

/**
 * Scalar settings that `config set` may change. Dependencies can only be
 * edited in the config file itself.
 */
export const SETTABLE_FIELDS = {
  installDir: absolutePath,
  scriptName: z
    .string()
    .min(1)
    .regex(/^[^/\0]+$/, 'must be a file name, not a path'),
  binDir: absolutePath,
  commandName: z.string().regex(COMMAND_NAME_PATTERN, 'must be a plain command name'),
  interpreter: z.string().regex(INTERPRETER_PATTERN, 'must be a command name or path'),
  shebang: z
    .string()
    .startsWith('#!', 'must start with #!')
    .refine(value => !value.includes('\n'), { message: 'must be a single line' })
} satisfies Record<string, z.ZodType<string>>;

export type SettableKey = keyof typeof SETTABLE_FIELDS;

export const SETTABLE_KEYS: readonly SettableKey[] = [
  'installDir',
  'scriptName',
  'binDir',
  'commandName',
  'interpreter',
  'shebang'
];

export function isSettableKey(key: string): key is SettableKey {
  return Object.prototype.hasOwnProperty.call(SETTABLE_FIELDS, key);
}

export const InstallerConfigSchema = z.object({
  ...SETTABLE_FIELDS,
  dependencies: z.array(DependencySpecSchema)
});

export type DependencySpec = z.infer<typeof DependencySpecSchema>;
export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;

/**
 * Render zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}
