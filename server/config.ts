import path from "path";

export const PORT = parseInt(process.env.PORT || "5000", 10);
export const NODE_ENV = process.env.NODE_ENV ?? "development";
export const SESSION_SECRET = process.env.SESSION_SECRET || "demand-dna-session-secret";

export const DATA_DIR = path.resolve(process.cwd(), process.env.DATA_DIR || "data");
export const PROFILES_PATH = path.join(DATA_DIR, process.env.PROFILES_FILE || "brand_profiles.csv");
export const TRANSACTIONS_PATH = path.join(DATA_DIR, process.env.TRANSACTIONS_FILE || "transactions.csv");
export const SETTINGS_PATH = path.join(DATA_DIR, process.env.SETTINGS_FILE || "settings.json");
