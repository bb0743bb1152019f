#!/usr/bin/env node
import dotenv from "dotenv";
import { main } from "./cli";

dotenv.config();

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("❌ Fatal error:", error);
    process.exit(1);
  });
