#!/usr/bin/env node
import { Command } from "commander";
import {
  handleChattr,
  handleHostAdd,
  handleHostList,
  handleHostRemove,
  handleHostShow,
  handleHostUse,
  handleMkdir,
  handlePut,
  handlePutDir,
  handleSyncPath,
  handleWrite,
  type RemoteCommandOptions,
} from "./commands";

const program = new Command();

program
  .name("rprov")
  .description("Privileged file provisioning over SSH")
  .version("0.1.0")
  .option("-v, --verbose", "Echo every privileged command");

function remoteCommand(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .option("--host <name>", "Saved host to use instead of the active one")
    .option("--owner <owner>", "chown target, e.g. www-data:www-data")
    .option("--mode <mode>", "chmod target, e.g. 644");
}

function withGlobals<T extends RemoteCommandOptions>(options: T): T {
  const verbose = program.opts<{ verbose?: boolean }>().verbose;
  return { ...options, verbose };
}

const host = program.command("host").description("Manage saved SSH hosts");

host
  .command("add <name>")
  .description("Prompt for connection details and save them as the active host")
  .action(async (name: string) => {
    await handleHostAdd(name);
  });

host
  .command("use <name>")
  .description("Set the active host")
  .action((name: string) => {
    handleHostUse(name);
  });

host
  .command("list")
  .description("List saved hosts")
  .action(() => {
    handleHostList();
  });

host
  .command("show [name]")
  .description("Show a saved host (defaults to the active one)")
  .action((name?: string) => {
    handleHostShow(name);
  });

host
  .command("remove <name>")
  .description("Delete a saved host")
  .action((name: string) => {
    handleHostRemove(name);
  });

remoteCommand("put <local> <remote>", "Upload a file with sudo")
  .action(async (local: string, remote: string, options: RemoteCommandOptions) => {
    await handlePut(local, remote, withGlobals(options));
  });

remoteCommand("write <remote>", "Upload text from --content or stdin with sudo")
  .option("--content <text>", "Text to write")
  .action(async (remote: string, options: RemoteCommandOptions & { content?: string }) => {
    await handleWrite(remote, withGlobals(options));
  });

remoteCommand("mkdir <remote>", "Create a directory (and parents) with sudo")
  .action(async (remote: string, options: RemoteCommandOptions) => {
    await handleMkdir(remote, withGlobals(options));
  });

remoteCommand("put-dir <localDir> <remoteDir>", "Upload a directory tree with sudo")
  .option("--ignore <glob...>", "Glob patterns to skip, relative to localDir")
  .action(
    async (localDir: string, remoteDir: string, options: RemoteCommandOptions & { ignore?: string[] }) => {
      await handlePutDir(localDir, remoteDir, withGlobals(options));
    }
  );

remoteCommand("chattr <remote>", "Change owner and/or mode with sudo")
  .action(async (remote: string, options: RemoteCommandOptions) => {
    await handleChattr(remote, withGlobals(options));
  });

program
  .command("sync-path <path>")
  .description("Print an rsync source path for syncing the directory or only its contents")
  .option("--contents <bool>", "\"true\" to sync the contents, anything else syncs the directory")
  .action((sourcePath: string, options: { contents?: string }) => {
    handleSyncPath(sourcePath, options);
  });

async function run(): Promise<void> {
  await program.parseAsync(process.argv);
}

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
