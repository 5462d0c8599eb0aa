import { parseCliArgs, USAGE } from "./args";
import { runBenchmarks } from "./harness";

try {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
  } else {
    runBenchmarks(options);
  }
} catch (e) {
  console.error(e instanceof Error ? e.message : e);
  console.error("Run with --help for usage.");
  process.exitCode = 1;
}
