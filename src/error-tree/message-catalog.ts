import { z } from 'zod';
import { formatMembers } from '../constraints/messages';
import type { ConstraintParams } from '../constraints/types';
import { ConfigError } from '../errors/config-error';
import { SecureYAMLLoader } from '../loaders/yaml-loader';
import { formatZodError } from '../validation/errors';
import type { Translator } from './localize';

const CatalogSchema = z.record(z.string().min(1), z.string());

const PLACEHOLDER = /\{\s*\$?([A-Za-z_][\w-]*)\s*\}/g;

/**
 * Fill `{name}` (or `{ $name }`) placeholders from `args`. A placeholder with
 * no matching argument makes the whole template unusable.
 */
export function formatTemplate(template: string, args: ConstraintParams): string | undefined {
  const missing: string[] = [];
  const text = template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(args, name)) {
      missing.push(name);
      return '';
    }
    return formatMembers(args[name]);
  });
  return missing.length > 0 ? undefined : text;
}

/**
 * Translator over a flat `messageId -> template` table.
 */
export class MessageCatalog implements Translator {
  private constructor(private readonly messages: ReadonlyMap<string, string>) {}

  static fromRecord(messages: Readonly<Record<string, string>>): MessageCatalog {
    return new MessageCatalog(new Map(Object.entries(messages)));
  }

  /**
   * Read a catalog from a YAML (or JSON) file inside `baseDir`.
   *
   * @throws ConfigError when the file is not a flat table of strings
   */
  static async load(filePath: string, baseDir: string): Promise<MessageCatalog> {
    const loader = new SecureYAMLLoader({ baseDir });
    const raw = await loader.load(filePath);
    const result = CatalogSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid message catalog: ${filePath}`, {
        cause: result.error,
        context: { data: { filePath, issues: formatZodError(result.error) } },
      });
    }
    return MessageCatalog.fromRecord(result.data);
  }

  get size(): number {
    return this.messages.size;
  }

  has(messageId: string): boolean {
    return this.messages.has(messageId);
  }

  translate(messageId: string, args: ConstraintParams): string | undefined {
    const template = this.messages.get(messageId);
    return template === undefined ? undefined : formatTemplate(template, args);
  }
}
