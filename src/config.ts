import { config } from "dotenv";
import { S3Client } from "@aws-sdk/client-s3";

config();

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === "") return fallback;
  return ["1", "true", "yes"].includes(value.toLowerCase());
};

export type NegativeValuePolicy = "clamp" | "reject";

const parseNegativeValuePolicy = (
  value: string | undefined
): NegativeValuePolicy => (value === "reject" ? "reject" : "clamp");

export const appConfig = {
  host: process.env.HOST || "0.0.0.0",
  port: parseInt(process.env.PORT || "3001"),
  nodeEnv: process.env.NODE_ENV || "development",
  // Routes under /sessions answer 401 while no token is configured
  apiToken: process.env.API_TOKEN || undefined,
} as const;

export const pipelineConfig = {
  maxConcurrentDocuments: parseInt(process.env.MAX_CONCURRENT_DOCUMENTS || "3"),
  maxConcurrentGroups: parseInt(process.env.MAX_CONCURRENT_GROUPS || "1"),
  staggerMs: parseInt(process.env.REQUEST_STAGGER_MS || "100"),
  retryAttempts: parseInt(process.env.PROCESSING_RETRY_ATTEMPTS || "3"),
  retryDelay: parseInt(process.env.PROCESSING_RETRY_DELAY || "1000"),
  downloadTimeout: parseInt(process.env.DOWNLOAD_TIMEOUT || "60000"),
  parseTimeout: parseInt(process.env.PARSE_TIMEOUT || "60000"),
  structuringTimeout: parseInt(process.env.STRUCTURING_TIMEOUT || "30000"),
  minContentLength: parseInt(process.env.MIN_CONTENT_LENGTH || "50"),
  promptCharBudget: parseInt(process.env.PROMPT_CHAR_BUDGET || "12000"),
  language: process.env.DOCUMENT_LANGUAGE || "es",
  negativeValuePolicy: parseNegativeValuePolicy(
    process.env.NEGATIVE_VALUE_POLICY
  ),
  tolerancePercent: parseFloat(
    process.env.RECONCILIATION_TOLERANCE_PERCENT || "1.0"
  ),
} as const;

export const cacheConfig = {
  directory: process.env.CACHE_DIR || "data/cache",
  maxEntries: parseInt(process.env.CACHE_MAX_ENTRIES || "1000"),
  maxAgeDays: parseInt(process.env.CACHE_MAX_AGE_DAYS || "30"),
  includeFileMetadata: parseBoolean(
    process.env.CACHE_FINGERPRINT_METADATA,
    false
  ),
} as const;

export const outputConfig = {
  directory: process.env.OUTPUT_DIR || "data/exports",
  tempDirectory: process.env.TEMP_DIR || "data/temp",
} as const;

export const sourceConfig = {
  kind: process.env.DOCUMENT_SOURCE === "s3" ? "s3" : "local",
  localRoot: process.env.LOCAL_DOCUMENT_ROOT || "data/documents",
} as const;

// MinIO/S3 configuration
export const s3Config = {
  endpoint: process.env.S3_ENDPOINT || undefined,
  region: process.env.S3_REGION || "eu-central-1",
  credentials: {
    accessKeyId: process.env.S3_ACCESS_KEY || "minioadmin",
    secretAccessKey: process.env.S3_SECRET_KEY || "minioadmin",
  },
  forcePathStyle: true,
} as const;

export const bucketName = process.env.S3_BUCKET || "documents";

export const openAIConfig = {
  apiKey: process.env.OPENAI_API_KEY,
  model: process.env.OPENAI_MODEL || "gpt-4o-mini",
  temperature: 0, // Deterministic for data extraction
} as const;

export const sheetsConfig = {
  serviceAccountEmail: process.env.GOOGLE_SERVICE_ACCOUNT_EMAIL,
  privateKey: process.env.GOOGLE_PRIVATE_KEY,
  spreadsheetId: process.env.GOOGLE_SHEETS_ID,
  range: process.env.GOOGLE_SHEETS_RANGE || "Sheet1!A:Z",
} as const;

// Helper to check if OpenAI is available
export const hasOpenAI = (): boolean => {
  return !!openAIConfig.apiKey;
};

let s3Instance: S3Client | null = null;

// Get S3 client (singleton)
export const getS3Client = (): S3Client => {
  if (!s3Instance) {
    s3Instance = new S3Client(s3Config);
    console.log("✅ S3 client initialized");
  }

  return s3Instance;
};

// Graceful shutdown helper
export const closeConnections = async (): Promise<void> => {
  if (s3Instance) {
    s3Instance.destroy();
    s3Instance = null;
    console.log("🔴 S3 client destroyed");
  }
};
