import { run } from "../src/cli";

await run();
