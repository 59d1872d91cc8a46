/**
 * External Dependencies
 * Centralized imports for external modules used throughout the application
 */

// Redis
export { createClient } from "redis";

// Environment and Configuration
export { config as loadEnv } from "dotenv";

// Logging
export { default as winston } from "winston";
export type { Logger } from "winston";

// Validation
export { z } from "zod";

// UUID generation
export { v4 as generateUuid, validate as isUuid } from "uuid";

// Cryptography
export { createHash } from "node:crypto";
