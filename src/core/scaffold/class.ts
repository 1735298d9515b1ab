/**
 * Registry-backed class flow.
 *
 * A defined class gets its own directory holding a package marker, the class
 * module and an empty registry document:
 *
 *     <root>/<snake>/index.ts
 *     <root>/<snake>/<snake>_class.ts
 *     <root>/<snake>/<snake>_registry.yml
 */
import * as path from 'node:path';
import { fileExists, removeDir, removeFile } from '../../utils/file-system.js';
import { ConflictError, ErrorCodes, SystemError, toFoldError } from '../../utils/errors.js';
import { BUNDLED_TEMPLATES_DIR } from '../targets/discovery.js';
import { RegistryStore } from '../registry/store.js';
import { assertClassName, assertSegment, classArtifactNames } from './naming.js';
import { domainDir, ensureDomainSection, ensurePackageDir, templateName, writeNewFile } from './files.js';
import { success, warning } from './outcome.js';
import type { DefineClassOptions, GenerationContext, ScaffoldOutcome } from './types.js';

export const CLASS_MODULE_TEMPLATE = 'class_module_template';

const RUNTIME_EXTENSIONS: Record<string, string> = {
  '.ts': '.js',
  '.tsx': '.js',
  '.mts': '.mjs',
  '.cts': '.cjs',
};

/** Specifier used to import a generated module from its sibling. */
export function importSpecifier(baseName: string, extension: string): string {
  return `./${baseName}${RUNTIME_EXTENSIONS[extension] ?? extension}`;
}

export function classDirectory(ctx: GenerationContext, className: string, domain?: string): string {
  const { directory } = classArtifactNames(className, ctx.settings.extension);
  return domain
    ? path.join(domainDir(ctx, domain), 'classes', directory)
    : path.join(ctx.target.root, directory);
}

export async function defineClass(
  ctx: GenerationContext,
  className: string,
  options: Pick<DefineClassOptions, 'domain' | 'version' | 'reverse'> = {}
): Promise<ScaffoldOutcome> {
  assertClassName(className);
  if (options.domain !== undefined) {
    assertSegment(options.domain, 'domain');
  }

  const dir = classDirectory(ctx, className, options.domain);
  if (options.reverse) {
    return removeClass(ctx, className, dir);
  }

  const { target, settings } = ctx;
  const names = classArtifactNames(className, settings.extension);
  const modulePath = path.join(dir, names.module);
  const registryPath = path.join(dir, names.registry);

  for (const existing of [modulePath, registryPath]) {
    if (await fileExists(existing)) {
      throw new ConflictError(
        ErrorCodes.ALREADY_EXISTS,
        `Class '${className}' already exists, not overwriting: ${existing}`,
        { path: existing }
      );
    }
  }

  const version = options.version ?? settings.default_version;
  const createdAt = ctx.clock();
  const registryType = className.toLowerCase();

  // Render everything before the first write.
  const { content: moduleContent } = await ctx.engine.renderFirst(
    [
      path.join(target.templates, templateName(`${CLASS_MODULE_TEMPLATE}${settings.extension}`)),
      path.join(BUNDLED_TEMPLATES_DIR, templateName(`${CLASS_MODULE_TEMPLATE}${settings.extension}`)),
    ],
    'class-module',
    {
      CLASS_NAME: className,
      SNAKE_NAME: names.snake,
      VERSION: version,
      CREATED_AT: createdAt.toISOString(),
      REGISTRY_TYPE: registryType,
      PACKAGE_NAME: target.package,
    }
  );
  const store = new RegistryStore({
    path: registryPath,
    registryType,
    version,
    target: target.package,
    createdAt,
    clock: ctx.clock,
    metadata: {
      description: `Registry for ${className} instances`,
      class_name: className,
      target: target.package,
      auto_backup: true,
    },
  });

  const created = options.domain !== undefined ? await ensureDomainSection(ctx, options.domain, 'classes') : [];
  created.push(
    ...(await ensurePackageDir(
      ctx,
      dir,
      `// ${className} module\nexport * from '${importSpecifier(`${names.snake}_class`, settings.extension)}';\n`
    ))
  );

  await writeNewFile(
    modulePath,
    moduleContent,
    `Class '${className}' already exists, not overwriting: ${modulePath}`
  );
  created.push(modulePath);

  try {
    await store.save();
  } catch (error) {
    await removeFile(modulePath);
    const cause = toFoldError(error);
    throw new SystemError(
      ErrorCodes.IO_FAILURE,
      `Failed to write registry for ${className}: ${cause.message}`,
      { path: registryPath, module: modulePath }
    );
  }
  created.push(registryPath);

  ctx.log.debug(`Defined class ${className}`, { created });
  return success(`Defined ${className} in ${target.package} -> ${dir}`, {
    path: dir,
    created,
    notes: [
      `Created: ${[names.module, names.registry].join(', ')}`,
      `Version: ${version}`,
    ],
  });
}

async function removeClass(
  ctx: GenerationContext,
  className: string,
  dir: string
): Promise<ScaffoldOutcome> {
  if (!(await removeDir(dir))) {
    return warning(`Class directory does not exist: ${dir}`, { path: dir });
  }
  ctx.log.debug(`Removed class ${className}`, { dir });
  return success(`Removed ${className} from ${ctx.target.package} -> ${dir}`, { path: dir });
}
