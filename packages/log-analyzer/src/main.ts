import "dotenv/config";

import { buildProgram, describeFailure } from "./cli.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(describeFailure(err));
    process.exit(1);
  });
