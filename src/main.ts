import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { Command } from "commander";
import {
  Context,
  Interpreter,
  InterpreterError,
  LispPrinter,
  parseExpression,
  parseProgram,
  RpnPrinter,
} from "./mod.ts";
import { show } from "./ast-walking/value.ts";
import { showSymbol } from "./ast-walking/symbols.ts";

type RunFlags = {
  showTree?: boolean;
  showSymbols?: boolean;
  trace?: boolean;
  all?: boolean;
};

// language errors are reported; anything else is a bug and propagates
const report = (e: unknown): void => {
  if (!(e instanceof InterpreterError)) throw e;
  console.error(`Error: ${e.message}`);
  process.exitCode = 1;
};

const calc = (line: string): void => {
  const ast = parseExpression(line);
  const result = new Interpreter(new Context()).calculate(ast);
  console.log(`Result: ${show(result)}`);
  console.log(`RPN: ${new RpnPrinter().print(ast)}`);
  console.log(`Lisp: ${new LispPrinter().print(ast)}`);
};

const runFile = async (file: string, flags: RunFlags): Promise<void> => {
  const src = await readFile(file, "utf8");
  const ast = parseProgram(src);
  const showSymbols = flags.showSymbols || flags.all;
  if (flags.showTree || flags.all) {
    console.log(`Tree:\n${JSON.stringify(ast, null, 2)}\n`);
  }

  const interpreter = new Interpreter(new Context(), {
    trace: flags.trace || flags.all,
    verbose: showSymbols,
  });
  const context = interpreter.interpret(ast);

  if (showSymbols && interpreter.symbols) {
    console.log("\nSymbol Table:");
    for (const sym of interpreter.symbols.entries()) {
      console.log(`  ${sym.name}: ${showSymbol(sym)}`);
    }
  }
  console.log("\nVariables:");
  for (const [name, value] of context.entries()) {
    console.log(`  ${name} = ${show(value)}`);
  }
};

const printAST = async (file: string): Promise<void> => {
  const src = await readFile(file, "utf8");
  console.log(JSON.stringify(parseProgram(src), null, 2));
};

const repl = async (): Promise<void> => {
  console.log("minipas calculator, Ctrl-D to quit");
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("calc > ");
  rl.prompt();

  for await (const line of rl) {
    if (line.trim() !== "") {
      try {
        calc(line);
      } catch (e) {
        report(e);
      }
      console.log();
    }
    rl.prompt();
  }
};

const main = async (): Promise<void> => {
  const program = new Command()
    .name("minipas")
    .version("0.1.0")
    .description("Interpreter for a small Pascal subset");

  program
    .command("repl", { isDefault: true })
    .description("Evaluate arithmetic expressions line by line")
    .action(async () => await repl());

  program
    .command("calc <expr>")
    .description("Evaluate one arithmetic expression")
    .action((expr: string) => calc(expr));

  program
    .command("run <file>")
    .description("Run a program file and print its variables")
    .option("-t, --show-tree", "show the AST")
    .option("-s, --show-symbols", "show symbol table activity")
    .option("--trace", "show each declaration and assignment")
    .option("-a, --all", "show everything")
    .action(async (file: string, flags: RunFlags) => await runFile(file, flags));

  program
    .command("ast <file>")
    .description("Show the AST of a program file")
    .action(async (file: string) => await printAST(file));

  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    report(e);
  }
};

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
