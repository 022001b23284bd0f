import { LOG_LEVELS, type AppConfig } from "../config";

export interface ParsedFlags {
  positional: string[];
  configPath?: string;
  help: boolean;
  overrides: Partial<AppConfig>;
}

function isLogLevel(value: string): value is AppConfig["log_level"] {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse decode CLI arguments. Unknown flags are ignored; flags only ever
 * override values that would otherwise come from config.yaml.
 */
export function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  const overrides: Partial<AppConfig> = {};
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--log-level" && args[i + 1]) {
      const level = args[++i];
      if (!isLogLevel(level)) {
        throw new Error(`Invalid log level: ${level} (expected ${LOG_LEVELS.join(", ")})`);
      }
      overrides.log_level = level;
    } else if (arg === "--create-output-dir") {
      overrides.create_output_dir = true;
    } else if (arg === "--all-files") {
      overrides.extract_images_only = false;
    } else if (arg === "--extended-formats") {
      overrides.accept_extended_image_formats = true;
    } else if (arg === "--simple-sorting") {
      overrides.simple_sorting = true;
    } else if (arg === "--skip-bad-pdf-pages") {
      overrides.skip_bad_pdf_pages = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, configPath, help, overrides };
}
