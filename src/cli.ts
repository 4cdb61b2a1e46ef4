import { Command, Option } from "commander";
import yaml from "js-yaml";
import { loadHmnConnections } from "./hmn_rows.js";
import { configureLogger, logger } from "./logger.js";
import { generateSls, loadInputs, planNetworks, prepareInputs, validateInputs, type InputPaths } from "./pipeline.js";
import { networksToSls } from "./sls_convert.js";
import { writeText } from "./util.js";
import * as xn from "./xname.js";

type InputOptions = {
  cabinets: string;
  switches: string;
  appNodeConfig?: string;
  systemConfig?: string;
};

function output(data: string, file: string | undefined): void {
  if (file) {
    writeText(file, data);
    logger.info("wrote output", { file });
  } else {
    process.stdout.write(data);
  }
}

function inputPaths(opts: InputOptions): InputPaths {
  return { cabinets: opts.cabinets, switches: opts.switches, appNodeConfig: opts.appNodeConfig, systemConfig: opts.systemConfig };
}

function withInputOptions(cmd: Command, appNodeConfig: "required" | "optional"): Command {
  cmd
    .requiredOption("--cabinets <yaml>", "cabinet detail file")
    .requiredOption("--switches <csv>", "switch metadata CSV")
    .option("--system-config <yaml>", "site configuration");
  if (appNodeConfig === "required") cmd.requiredOption("--app-node-config <yaml>", "application node config");
  else cmd.option("--app-node-config <yaml>", "application node config");
  return cmd;
}

export function registerXnameCommand(program: Command): void {
  program
    .command("xname")
    .description("print the type and parent of each xname")
    .argument("<xnames...>")
    .option("--normalize", "strip leading zeros first", false)
    .action((xnames: string[], opts: { normalize: boolean }) => {
      for (const arg of xnames) {
        const x = opts.normalize ? xn.normalize(arg) : arg;
        const type = xn.getType(x);
        const parent = type === xn.INVALID || type === xn.T.System ? "-" : xn.parent(x);
        process.stdout.write(`${x} ${type} ${parent}\n`);
      }
    });
}

export function registerValidateCommand(program: Command): void {
  withInputOptions(program.command("validate").description("validate the inputs and list every problem"), "required").action(
    (opts: InputOptions) => {
      const invalid = validateInputs(loadInputs(inputPaths(opts)));
      if (!invalid) {
        process.stdout.write("inputs are valid\n");
        return;
      }
      for (const issue of invalid.issues) process.stdout.write(`${issue}\n`);
      process.exitCode = 1;
    },
  );
}

export function registerNetworksCommand(program: Command): void {
  withInputOptions(program.command("networks").description("write the network plan as YAML"), "optional")
    .option("-o, --output <file>", "output file (stdout when omitted)")
    .action((opts: InputOptions & { output?: string }) => {
      const inputs = prepareInputs(loadInputs(inputPaths(opts)));
      const networks = planNetworks(inputs, logger);
      output(yaml.dump(networksToSls(networks), { noRefs: true, lineWidth: -1 }), opts.output);
    });
}

export function registerGenSlsCommand(program: Command): void {
  withInputOptions(program.command("gen-sls").description("generate the SLS input file"), "required")
    .requiredOption("--hmn-connections <json>", "HMN connections file")
    .option("-o, --output <file>", "output file", "sls_input_file.json")
    .action((opts: InputOptions & { hmnConnections: string; output: string }) => {
      const inputs = prepareInputs(loadInputs(inputPaths(opts)));
      const state = generateSls(inputs, loadHmnConnections(opts.hmnConnections), logger);
      output(`${JSON.stringify(state, null, 2)}\n`, opts.output);
    });
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("site-init")
    .description("derive hardware inventory and network plans from site-initialization inputs")
    .option("--log-level <level>", "log level", process.env.LOG_LEVEL ?? "info")
    .addOption(new Option("--log-format <format>", "log record format").choices(["json", "text"]).default("json"))
    .hook("preAction", (cmd) => {
      const opts = cmd.opts<{ logLevel: string; logFormat: string }>();
      configureLogger({ level: opts.logLevel, json: opts.logFormat === "json" });
    });

  registerXnameCommand(program);
  registerValidateCommand(program);
  registerNetworksCommand(program);
  registerGenSlsCommand(program);
  return program;
}
