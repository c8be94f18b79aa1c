import { Command } from "commander";
import { consola } from "consola";
import type { CommonOptions } from "@/cli/helpers";
import { apisCommand, existsCommand, getCommand, listCommand, type GetCommandOptions } from "@/cli/read";
import { deleteCommand, upsertCommand, type UpsertCommandOptions } from "@/cli/write";
import { errorMessage } from "@/lib/errors";

function withCommonOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "config file path")
    .option("--json", "print JSON output")
    .option("-v, --verbose", "log every request");
}

const program = new Command();
program
  .name("dt-config-sync")
  .description("create, update, read and delete monitoring configs by name")
  .showHelpAfterError();

program
  .command("apis")
  .description("list the known config APIs")
  .option("--json", "print JSON output")
  .action((options: { json?: boolean }) => apisCommand(options));

withCommonOptions(program.command("list <api>").description("list configs of an API")).action(
  (api: string, options: CommonOptions) => listCommand(api, options),
);

withCommonOptions(
  program.command("exists <api> <name>").description("check whether a config exists; exits 1 when absent"),
).action((api: string, name: string, options: CommonOptions) => existsCommand(api, name, options));

withCommonOptions(
  program
    .command("get <api> [name]")
    .description("print a config body, addressed by name or by --id")
    .option("--id <id>", "address the config by its remote id"),
).action((api: string, name: string | undefined, options: GetCommandOptions) => getCommand(api, name, options));

withCommonOptions(
  program
    .command("upsert <api> <name>")
    .description("create or replace a config by name")
    .requiredOption("-f, --file <path>", "JSON body (extension manifest for extensions)"),
).action((api: string, name: string, options: UpsertCommandOptions) => upsertCommand(api, name, options));

withCommonOptions(program.command("delete <api> <name>").description("delete a config by name")).action(
  (api: string, name: string, options: CommonOptions) => deleteCommand(api, name, options),
);

program.parseAsync(process.argv).catch((error: unknown) => {
  consola.error(errorMessage(error));
  process.exit(1);
});
