#!/usr/bin/env node
import { main } from "./cli";
import { errorMessage, isFatal } from "./core/errors";
import { Logger } from "./core/utils";

main().catch((e: unknown) => {
  Logger.error(
    isFatal(e) ? errorMessage(e) : `Unexpected failure: ${errorMessage(e)}`
  );
  process.exitCode = 1;
});
