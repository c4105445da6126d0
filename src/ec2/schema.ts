/**
 * TypeBox schema for launch options
 */

import { Type } from '@sinclair/typebox';
import { Check } from '@sinclair/typebox/value';
import { Errors } from '@sinclair/typebox/errors';

export const LaunchAmiLikeOptionsSchema = Type.Object({
  amiId: Type.String({ pattern: '^ami-[0-9a-f]+$' }),
  modelInstanceId: Type.String({ pattern: '^i-[0-9a-f]+$' }),
  count: Type.Optional(Type.Integer({ minimum: 1 })),
  region: Type.Optional(Type.String({ minLength: 1 })),
  copyTags: Type.Optional(Type.Object({
    copyTags: Type.Boolean(),
    setTags: Type.Optional(Type.Record(Type.String(), Type.String())),
  })),
});

/**
 * Returns the list of problems with the options; empty when they are valid
 */
export function checkLaunchOptions(options: unknown): string[] {
  if (Check(LaunchAmiLikeOptionsSchema, options)) return [];

  const errors: string[] = [];
  for (const error of Errors(LaunchAmiLikeOptionsSchema, options)) {
    errors.push(`${error.path || '(root)'}: ${error.message}`);
  }
  return errors.length > 0 ? errors : ['Launch options do not match schema'];
}
