import fs from "node:fs";
import dotenv from "dotenv";

// Base .env first, then .env.local on top.
if (fs.existsSync(".env")) {
  dotenv.config({ path: ".env" });
}
if (fs.existsSync(".env.local")) {
  dotenv.config({ path: ".env.local", override: true });
}
