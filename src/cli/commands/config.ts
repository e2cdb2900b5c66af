/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to set defaults for format, title, sort and output.");
  console.log("Project settings in book.toml / book.json take precedence over it.");
}
