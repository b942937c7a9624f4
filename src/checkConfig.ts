import { config, describeConfig, validateConfig } from "./config";

const errors = validateConfig(config);
describeConfig(config).forEach((line) => console.log(line));

if (errors.length > 0) {
  console.error("\nConfiguration errors:");
  errors.forEach((error) => console.error(`  - ${error}`));
  process.exit(1);
}
console.log("\nConfiguration OK");
