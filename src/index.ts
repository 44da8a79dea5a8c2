#!/usr/bin/env node
import { program } from 'commander';
import { TOOL_NAME, TOOL_VERSION } from './config/constants';
import { loadDotEnv } from './boundaries/dotenv-loader';
import { registerCiteCommand } from './cli/cite-command';
import { registerVerifyCommand } from './cli/verify-command';

loadDotEnv();

program
  .name(TOOL_NAME)
  .description('Claim extraction, citation and fact-checking against research data')
  .version(TOOL_VERSION);

registerCiteCommand(program);
registerVerifyCommand(program);

program.parse();
