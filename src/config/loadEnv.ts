import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

const projectRoot = path.resolve(__dirname, "..", "..");

// ENV_FILE wins over the project root, which wins over the working directory.
const candidates = [
  process.env.ENV_FILE ? path.resolve(process.env.ENV_FILE) : null,
  path.join(projectRoot, ".env"),
  path.join(process.cwd(), ".env"),
].filter((candidate): candidate is string => candidate !== null);

const envFile = candidates.find((candidate) => fs.existsSync(candidate));

if (envFile) {
  dotenv.config({ path: envFile });
  if (process.env.NODE_ENV !== "test") {
    console.log(`[config] loaded ${path.relative(process.cwd(), envFile) || envFile}`);
  }
}
