// Imported first by main.ts so `.env` is in place before any config module reads process.env.
import dotenv from "dotenv";
import dotenvExpand from "dotenv-expand";

dotenvExpand.expand(dotenv.config());
