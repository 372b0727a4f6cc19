import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import JSON5 from "json5";

import { PromptConfigError, toError, type ConfigValidationIssue } from "../errors";
import { createLogger, type Logger } from "../logger";
import { err, ok, type Result } from "../result";
import type { FeatureConfig } from "../types/prompt";
import { createDefaultFeatureConfig } from "./defaults";
import { toSettingsDocument, validatePromptSettings } from "./schema";
import type { PromptSettingsStoreOptions } from "./types";

const SETTINGS_HEADER = [
  "// Default browser prompt settings (JSON5)",
  "// Thresholds are calendar days, except maxTimesShown which counts prompts.",
  "// eligibleUserTypes: any of \"new\", \"returning\", \"existing\".",
].join("\n");

function isMissingFileError(value: unknown): boolean {
  return typeof value === "object"
    && value !== null
    && "code" in value
    && value.code === "ENOENT";
}

function formatValidationErrorMessage(issues: ConfigValidationIssue[]): string {
  return [
    "Prompt settings validation failed:",
    ...issues.map((issue) => `- ${issue.path}: ${issue.message}`),
  ].join("\n");
}

/**
 * JSON5 settings file holding the prompt thresholds.
 *
 * {@link settings} always answers synchronously with the last settings that
 * loaded cleanly; a failed {@link load} leaves them in place.
 */
export class PromptSettingsStore {
  private readonly createIfMissing: boolean;
  private readonly logger: Logger;
  private current: FeatureConfig = createDefaultFeatureConfig();
  private loadedOnce = false;

  constructor(
    private readonly settingsPath: string,
    options: PromptSettingsStoreOptions = {},
    logger?: Logger,
  ) {
    this.createIfMissing = options.createIfMissing ?? true;
    this.logger = logger ?? createLogger("prompt-settings");
  }

  settings(): FeatureConfig {
    return this.current;
  }

  hasLoaded(): boolean {
    return this.loadedOnce;
  }

  async load(): Promise<Result<FeatureConfig, PromptConfigError>> {
    const result = await this.read();
    if (!result.ok) {
      this.logger.warn("Keeping previous prompt settings", {
        path: this.settingsPath,
        code: result.error.code,
        message: result.error.message,
      });
      return result;
    }

    this.current = result.value;
    this.loadedOnce = true;
    this.logger.debug("Prompt settings loaded", {
      path: this.settingsPath,
      enabled: result.value.enabled,
    });
    return result;
  }

  async write(config: FeatureConfig): Promise<Result<void, PromptConfigError>> {
    const document = toSettingsDocument(config);
    const validation = validatePromptSettings(document);
    if (!validation.isValid) {
      return err(new PromptConfigError(
        formatValidationErrorMessage(validation.issues),
        "SETTINGS_VALIDATION_ERROR",
        validation.issues,
      ));
    }

    const content = `${SETTINGS_HEADER}\n${JSON5.stringify(document, null, 2)}\n`;
    const tmpPath = `${this.settingsPath}.tmp`;

    try {
      await mkdir(dirname(this.settingsPath), { recursive: true });
      await writeFile(tmpPath, content, "utf8");
      await rename(tmpPath, this.settingsPath);
    } catch (writeError) {
      return err(new PromptConfigError(
        `Unable to write prompt settings at ${this.settingsPath}`,
        "SETTINGS_WRITE_ERROR",
        [],
        toError(writeError),
      ));
    }

    this.current = validation.config;
    return ok(undefined);
  }

  private async read(): Promise<Result<FeatureConfig, PromptConfigError>> {
    let content: string;
    try {
      content = await readFile(this.settingsPath, "utf8");
    } catch (readError) {
      if (isMissingFileError(readError) && this.createIfMissing) {
        const defaults = createDefaultFeatureConfig();
        const writeResult = await this.write(defaults);
        return writeResult.ok ? ok(defaults) : writeResult;
      }

      return err(new PromptConfigError(
        `Unable to read prompt settings at ${this.settingsPath}`,
        "SETTINGS_READ_ERROR",
        [],
        toError(readError),
      ));
    }

    let parsed: unknown;
    try {
      parsed = JSON5.parse(content);
    } catch (parseError) {
      return err(new PromptConfigError(
        `Unable to parse prompt settings at ${this.settingsPath}`,
        "SETTINGS_PARSE_ERROR",
        [],
        toError(parseError),
      ));
    }

    const validation = validatePromptSettings(parsed);
    if (!validation.isValid) {
      return err(new PromptConfigError(
        formatValidationErrorMessage(validation.issues),
        "SETTINGS_VALIDATION_ERROR",
        validation.issues,
      ));
    }

    return ok(validation.config);
  }
}
