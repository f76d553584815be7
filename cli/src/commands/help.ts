import { HELP } from "../command.js";

export function handleHelp(): never {
  console.log(HELP);
  process.exit(0);
}
