/**
 * Entry point for every generation flow. Each call resolves its target,
 * runs one flow and reports a ScaffoldOutcome; nothing thrown inside a flow
 * escapes.
 */
import { GenerationSettingsSchema, type GenerationSettings } from '../config/schema.js';
import type { TargetResolver } from '../targets/resolver.js';
import { TemplateEngine } from '../templates/engine.js';
import type { Clock } from '../registry/item.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { registerDomain } from './domain.js';
import { registerVerb } from './verb.js';
import { defineClass } from './class.js';
import { defineClassFile } from './class-file.js';
import { registerCli } from './cli.js';
import { buildDomain } from './build-domain.js';
import { failure } from './outcome.js';
import type {
  DefineClassFileOptions,
  DefineClassOptions,
  GenerationContext,
  RegisterVerbOptions,
  ScaffoldOutcome,
  TargetOption,
} from './types.js';

export interface ScaffoldGeneratorOptions {
  settings?: GenerationSettings;
  /** Defaults to an engine in the settings' placeholder mode */
  engine?: TemplateEngine;
  clock?: Clock;
  logger?: Logger;
}

export class ScaffoldGenerator {
  private readonly settings: GenerationSettings;
  private readonly engine: TemplateEngine;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly resolver: TargetResolver,
    options: ScaffoldGeneratorOptions = {}
  ) {
    this.settings = options.settings ?? GenerationSettingsSchema.parse({});
    this.engine = options.engine ?? new TemplateEngine(this.settings.placeholders);
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? rootLogger.child('scaffold');
  }

  registerDomain(name: string, options: TargetOption = {}): Promise<ScaffoldOutcome> {
    return this.run(options.target, (ctx) => registerDomain(ctx, name));
  }

  registerVerb(name: string, options: RegisterVerbOptions = {}): Promise<ScaffoldOutcome> {
    return this.run(options.target, (ctx) => registerVerb(ctx, name, options.inline));
  }

  defineClass(className: string, options: DefineClassOptions = {}): Promise<ScaffoldOutcome> {
    return this.run(options.target, (ctx) => defineClass(ctx, className, options));
  }

  defineClassFile(className: string, options: DefineClassFileOptions = {}): Promise<ScaffoldOutcome> {
    return this.run(options.target, (ctx) => defineClassFile(ctx, className, options));
  }

  registerCli(name: string, options: TargetOption = {}): Promise<ScaffoldOutcome> {
    return this.run(options.target, (ctx) => registerCli(ctx, name));
  }

  buildDomain(name: string, options: TargetOption = {}): Promise<ScaffoldOutcome> {
    return this.run(options.target, (ctx) => buildDomain(ctx, name));
  }

  private async run(
    targetName: string | undefined,
    flow: (ctx: GenerationContext) => Promise<ScaffoldOutcome>
  ): Promise<ScaffoldOutcome> {
    try {
      const ctx: GenerationContext = {
        target: this.resolver.resolve(targetName),
        engine: this.engine,
        settings: this.settings,
        clock: this.clock,
        log: this.log,
      };
      return await flow(ctx);
    } catch (error) {
      const outcome = failure(error);
      this.log.debug(`Flow ended with ${outcome.status}`, { code: outcome.code, message: outcome.message });
      return outcome;
    }
  }
}
