import chalk from "chalk";
import type { ConsolidatedResult, EntityLists } from "../types";

function printList(title: string, items: readonly string[]): void {
  console.log(`\n${chalk.bold(title)} ${chalk.gray(`(${items.length})`)}`);
  for (const item of items) {
    console.log(`  • ${item}`);
  }
}

export function printResult(result: ConsolidatedResult | EntityLists): void {
  console.log(chalk.blue.bold("\nExtracted entities"));
  console.log(chalk.gray("=".repeat(60)));

  if ("summary" in result && result.summary !== undefined) {
    console.log(`\n${chalk.bold("Summary")}`);
    console.log(`  ${result.summary}`);
  }
  printList("Persons", result.persons);
  printList("Companies", result.companies);
  printList("Events", result.events);
}
