import { compileUnit, DiagnosticError, type Diagnostic } from "@qcheck/compiler";
import { getConfig } from "./config/index.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { printJson, renderProgram, renderTypedDefinitions } from "./output.js";
import { readUnitFile, UnitFileError } from "./unit-file.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const definitions = await readUnitFile(config.unit);
  const result = compileUnit({
    definitions,
    options: {
      unit: config.unit,
      maxSpecializationDepth: config.maxSpecializationDepth,
      recoverDiagnosticErrors: !config.failFast,
      skipMonomorphisation: !config.monomorphise,
    },
  });

  reportDiagnostics(result.diagnostics, config.color);

  if (config.emitTyped) {
    printJson(renderTypedDefinitions(result.check), result.check.arena);
  }

  if (config.monomorphise && result.program) {
    printJson(renderProgram(result.program, result.check.arena), result.check.arena);
  }

  if (!result.success) {
    process.exitCode = 1;
    return;
  }

  if (!config.emitTyped && !config.monomorphise) {
    console.log(
      `checked ${result.check.functions.size} definition(s) in ${config.unit}`
    );
  }
}

const reportDiagnostics = (
  diagnostics: readonly Diagnostic[],
  color: boolean
): void => {
  diagnostics.forEach((diagnostic) =>
    console.error(formatCliDiagnostic(diagnostic, { color }))
  );
};

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    reportDiagnostics(error.diagnostics, getConfig().color);
    process.exitCode = 1;
    return;
  }

  if (error instanceof UnitFileError) {
    console.error(error.message);
    process.exitCode = 1;
    return;
  }

  console.error(error);
  process.exitCode = 1;
}
