/**
 * Localize command - Loads config and runs the localization pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, Logger, Tracker, InvalidInputPathError } from "../../utils";
import { createRunContext } from "../../localizer";
import * as modules from "../../modules";
import type { LocalizationContext, LocalizerConfig } from "../../types";

const LocalizeOptionsSchema = z.object({
  config: z.string().optional(),
  imagesDir: z.string().optional(),
  timeout: z.coerce.number().int().positive().optional(),
  retries: z.coerce.number().int().nonnegative().optional(),
  dryRun: z.boolean().optional(),
  report: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof LocalizeOptionsSchema>;

/**
 * Apply CLI flags on top of the loaded configuration
 */
export function applyOptions(
  config: LocalizerConfig,
  options: z.infer<typeof LocalizeOptionsSchema>,
): LocalizerConfig {
  return {
    ...config,
    images: {
      ...config.images,
      directory: options.imagesDir ?? config.images.directory,
      timeout: options.timeout ?? config.images.timeout,
      retries: options.retries ?? config.images.retries,
    },
    logging: {
      level: options.verbose ? "debug" : config.logging.level,
    },
  };
}

export async function localizeCommand(
  root: string,
  opts: Options,
): Promise<void> {
  const options = LocalizeOptionsSchema.parse(opts);
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: !options.verbose,
  }).start();

  try {
    // Load configuration (default → user → custom), then CLI flags
    const loaded = await loadConfig(options.config);
    const config = applyOptions(loaded.config, options);

    const logger = new Logger(config.logging.level);
    const tracker = new Tracker();

    // Add any config loading errors to tracker
    for (const err of loaded.errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx: LocalizationContext = {
      root,
      config,
      tracker,
      logger,
      run: createRunContext(config.images, {
        dryRun: options.dryRun,
        logger,
      }),
      dryRun: options.dryRun,
      verbose: options.verbose,
      reportPath: options.report,
    };

    spinner.text = "Scanning files...";
    await modules.scan(ctx);

    spinner.text = `Localizing images in ${ctx.files?.length ?? 0} files...`;
    await modules.process(ctx);

    spinner.stop();

    await modules.stats(ctx);
  } catch (error) {
    if (error instanceof InvalidInputPathError) {
      spinner.fail(error.message);
    } else {
      spinner.fail("Localization failed");
      console.error(error);
    }
    process.exit(1);
  }
}
