import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { createHash } from 'crypto';
import { isAbsolute, resolve } from 'path';
import { TemplateEngine } from './template-engine.js';
import { parseCloudFormationYaml } from './cfn-yaml.js';
import { toTemplateDocument } from './template-analyzer.js';
import { isBuiltinKind } from './cloudformation-generator.js';
import { GeneratorContext, LoadedTemplate } from './types.js';
import { StageConfig } from '../types/index.js';
import { StackctlError, errorMessage } from '../errors/index.js';
import { isPlainObject } from '../utils/objects.js';

const BUILTIN_PREFIX = 'builtin:';

export interface TemplateStoreOptions {
  /** Directory template paths are resolved against, normally the project file's directory */
  baseDir: string;
  engine?: TemplateEngine;
  /** Send built-in templates as compact JSON */
  minify?: boolean;
}

export function hashTemplateBody(body: string): string {
  return createHash('sha256').update(body).digest('hex');
}

/**
 * Holds the declarative template of each stage, either generated from a
 * built-in kind or read from a file.
 */
export class TemplateStore {
  private readonly engine: TemplateEngine;
  private readonly cache = new Map<string, LoadedTemplate>();

  constructor(private readonly options: TemplateStoreOptions) {
    this.engine = options.engine ?? new TemplateEngine();
  }

  async load(stage: StageConfig, context: GeneratorContext): Promise<LoadedTemplate> {
    if (stage.template.startsWith(BUILTIN_PREFIX)) {
      return this.loadBuiltin(stage, context);
    }

    const path = isAbsolute(stage.template) ? stage.template : resolve(this.options.baseDir, stage.template);
    const cached = this.cache.get(path);
    if (cached) {
      return cached;
    }

    if (!existsSync(path)) {
      throw new StackctlError('TEMPLATE_NOT_FOUND', `Template file not found for stage ${stage.name}: ${path}`, {
        stage: stage.name
      });
    }

    const body = await readFile(path, 'utf-8');
    let parsed: unknown;
    try {
      parsed = this.parse(path, body);
    } catch (error) {
      throw new StackctlError('TEMPLATE_INVALID', `Failed to parse template ${path}: ${errorMessage(error)}`, {
        stage: stage.name,
        cause: error
      });
    }

    const document = toTemplateDocument(parsed, path);
    const loaded: LoadedTemplate = {
      source: path,
      document,
      raw: isPlainObject(parsed) ? parsed : document,
      body,
      hash: hashTemplateBody(body)
    };
    this.cache.set(path, loaded);
    return loaded;
  }

  private loadBuiltin(stage: StageConfig, context: GeneratorContext): LoadedTemplate {
    const kind = stage.template.slice(BUILTIN_PREFIX.length);
    if (!isBuiltinKind(kind)) {
      throw new StackctlError('TEMPLATE_NOT_FOUND', `Unknown built-in template ${stage.template} for stage ${stage.name}`, {
        stage: stage.name
      });
    }

    const document = this.engine.generateTemplate(kind, context);
    const body = this.engine.render(document, { minify: this.options.minify });
    return { source: stage.template, document, raw: document, body, hash: hashTemplateBody(body) };
  }

  private parse(path: string, body: string): unknown {
    if (path.endsWith('.json')) {
      return JSON.parse(body);
    }
    if (path.endsWith('.template') && body.trimStart().startsWith('{')) {
      return JSON.parse(body);
    }
    return parseCloudFormationYaml(body);
  }
}
