#!/usr/bin/env node

/**
 * mail-rules CLI - mirror a mailbox and run workflows against it
 */

import { Command } from "commander";
import { fetchCommand } from "./commands/fetch.js";
import { applyRulesCommand } from "./commands/apply-rules.js";
import { historyCommand } from "./commands/history.js";

const program = new Command();

program
  .name("mail-rules")
  .description("Declarative rules for a locally mirrored mailbox")
  .version("0.1.0");

program.addCommand(fetchCommand);
program.addCommand(applyRulesCommand);
program.addCommand(historyCommand);

await program.parseAsync();
