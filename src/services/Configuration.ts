import { IConfiguration } from "../interfaces/services";
import {
  BackoffSettings,
  InputSettings,
  JobSettings,
  RedactionServiceSettings,
} from "../types/domain";
import dotenv from "dotenv";

const DEFAULT_API_VERSION = "2025-05-15-preview";
const REQUEST_RETRY_BASE_DELAY_MS = 500;
const FILE_RETRY_BASE_DELAY_MS = 2000;
const JITTER_FRACTION = 0.25;

const TRUTHY = new Set(["1", "true", "yes"]);

// Configuration service - keeps all env vars in one place
export class Configuration implements IConfiguration {
  constructor(loadDotenv: boolean = true) {
    if (loadDotenv) {
      dotenv.config(); // Load .env file
    }
  }

  get(key: string): string | undefined {
    const value = process.env[key];
    return value === "" ? undefined : value;
  }

  getNumber(key: string, defaultValue: number = 0): number {
    const value = this.get(key);
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  getFloat(key: string, defaultValue: number = 0): number {
    const value = this.get(key);
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  // Accepts 1/true/yes in any case
  getBoolean(key: string, defaultValue: boolean = false): boolean {
    const value = this.get(key);
    if (!value) return defaultValue;
    return TRUTHY.has(value.trim().toLowerCase());
  }

  getRequired(key: string): string {
    const value = this.get(key);
    if (!value) {
      throw new Error(`${key} environment variable is not set.`);
    }
    return value;
  }

  getEndpoint(): string {
    const endpoint = this.getRequired("AZURE_LANGUAGE_SERVICE_ENDPOINT").trim();
    return endpoint.endsWith("/") ? endpoint : `${endpoint}/`;
  }

  getApiKey(): string {
    return this.getRequired("AZURE_LANGUAGE_API_KEY");
  }

  getMaxConcurrency(): number {
    return Math.max(1, this.getNumber("MAX_CONCURRENCY", 50));
  }

  getBackoffFactor(): number {
    return this.getFloat("HTTP_BACKOFF_FACTOR", 1.5);
  }

  getMaxPollIntervalMs(): number {
    return this.seconds("MAX_POLL_INTERVAL_SECONDS", 15);
  }

  getRedactionServiceSettings(): RedactionServiceSettings {
    return {
      endpoint: this.getEndpoint(),
      apiKey: this.getApiKey(),
      apiVersion: this.get("AZURE_LANGUAGE_API_VERSION") || DEFAULT_API_VERSION,
      language: this.get("REDACTION_LANGUAGE") || "en",
      redactionCharacter: this.get("REDACTION_CHARACTER") || "*",
      timeoutMs: this.seconds("HTTP_TIMEOUT_SECONDS", 30),
      retry: {
        maxAttempts: Math.max(1, this.getNumber("MAX_HTTP_RETRIES", 5)),
        backoff: this.backoff(REQUEST_RETRY_BASE_DELAY_MS),
      },
    };
  }

  getJobSettings(): JobSettings {
    return {
      maxFileRetries: Math.max(1, this.getNumber("MAX_FILE_RETRIES", 3)),
      fileRetryBackoff: this.backoff(FILE_RETRY_BASE_DELAY_MS),
      initialPollIntervalMs: this.seconds("INITIAL_POLL_INTERVAL_SECONDS", 2),
      maxPollIntervalMs: this.getMaxPollIntervalMs(),
      pollBackoffFactor: this.getBackoffFactor(),
      pollTimeoutMs: this.seconds("POLL_TIMEOUT_SECONDS", 1200),
    };
  }

  getInputSettings(): InputSettings {
    const csvDelimiter = this.get("CSV_DELIMITER") ?? "|";
    if (csvDelimiter.length !== 1) {
      throw new Error(`CSV_DELIMITER must be a single character, got "${csvDelimiter}"`);
    }

    return {
      inputDir: this.get("INPUT_DIR") || "input",
      outputDir: this.get("OUTPUT_DIR") || "output",
      csvDelimiter,
      jsonMapping: {
        conversationPath: this.get("JSON_CONVERSATION_PATH"),
        participantField: this.get("JSON_PARTICIPANT_FIELD") || "participant",
        textField: this.get("JSON_TEXT_FIELD") || "text",
        timestampField: this.get("JSON_TIMESTAMP_FIELD"),
        multiDocument: this.getBoolean("JSON_MULTI_DOC", false),
      },
    };
  }

  private backoff(baseDelayMs: number): BackoffSettings {
    return {
      baseDelayMs,
      backoffFactor: this.getBackoffFactor(),
      jitterFraction: JITTER_FRACTION,
      maxDelayMs: this.getMaxPollIntervalMs(),
    };
  }

  private seconds(key: string, defaultSeconds: number): number {
    return Math.round(this.getFloat(key, defaultSeconds) * 1000);
  }
}
