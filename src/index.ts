#!/usr/bin/env node
import { Command } from 'commander';
import { registerConfigCommands } from './commands/config.js';
import { registerSyncCommand } from './commands/sync.js';

const program = new Command();
program
  .name('metasync')
  .description('Sync files and directories with S3, keeping uid, gid, mode and mtime as object metadata')
  .version('0.1.0')
  .addHelpText('before', `
GETTING STARTED
  metasync <local> s3://<bucket>/<prefix>/    Upload a directory tree
  metasync s3://<bucket>/<prefix>/ <local>    Download a prefix
  metasync config set <key> <value>           Persist a default
`);

registerConfigCommands(program);
registerSyncCommand(program);

await program.parseAsync();
