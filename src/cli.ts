#!/usr/bin/env node
import { Command } from "commander";
import fs from "fs/promises";
import type { Logger } from "pino";
import { defaultWriterSettings, loadWriterSettings, type WriterSettings } from "./settings";
import { createLogger } from "./utils/logger";
import { Writer } from "./writer";

export interface ConvertOptions {
  output?: string;
  config?: string;
  stylesheet?: string;
  compact?: boolean;
  lenient?: boolean;
  cloakEmailAddresses?: boolean;
}

function resolveSettings(opts: ConvertOptions): WriterSettings {
  const settings = opts.config ? loadWriterSettings(opts.config) : defaultWriterSettings();
  if (opts.stylesheet !== undefined) settings.stylesheet = opts.stylesheet;
  if (opts.compact) settings.prettyPrint = false;
  if (opts.lenient) settings.strictNodeKinds = false;
  if (opts.cloakEmailAddresses) settings.cloakEmailAddresses = true;
  return settings;
}

/** Converts one docutils XML file and returns the page; writes it too when an output path is given. */
export async function convertFile(
  input: string,
  opts: ConvertOptions,
  logger: Logger = createLogger({ file: "cli" }),
): Promise<string> {
  const settings = resolveSettings(opts);
  const xml = await fs.readFile(input, "utf8");
  const html = new Writer({ settings, logger }).writeXml(xml);
  if (opts.output) {
    await fs.writeFile(opts.output, html, "utf8");
    logger.info(`wrote ${opts.output}`);
  }
  return html;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("doctree-html5")
    .description("Render a docutils XML document as an HTML5 page")
    .argument("<input>", "Source XML file")
    .option("-o, --output <path>", "Output file (stdout when omitted)")
    .option("-c, --config <path>", "JSON settings file")
    .option("--stylesheet <url>", "Stylesheet to link; empty for none")
    .option("--compact", "Do not indent the output")
    .option("--lenient", "Pass unknown elements through instead of failing")
    .option("--cloak-email-addresses", "Obfuscate e-mail addresses in links")
    .action(async (input: string, opts: ConvertOptions) => {
      const html = await convertFile(input, opts);
      if (!opts.output) process.stdout.write(html);
    });
  return program;
}

if (require.main === module) {
  const logger = createLogger({ file: "cli" });
  buildProgram()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      logger.error(e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    });
}
