#!/usr/bin/env node
import * as dotenv from "dotenv";
import { main } from "./githubAction";

dotenv.config();

main().then(
  (code) => process.exit(code),
  (error: Error) => {
    console.error("Unexpected failure:", error);
    process.exit(1);
  }
);
