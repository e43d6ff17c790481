import { Assembler, AssemblerOptions } from "../../../src/assembler/Assembler.js";
import { CellValue } from "../../../src/assembler/CellValue.js";
import { imageToRecord } from "../../../src/outputformats/ImageFormat.js";
import { Program } from "../../../src/parser/nodes/Node.js";
import { InstructionSet, loadPreludeInstructionSet } from "../../../src/tables/InstructionSet.js";
import { CodeError } from "../../../src/utils/CodeError.js";

export interface TestData {
    asm: Assembler;
    errors: readonly CodeError[];
    warnings: readonly CodeError[];
    ast: Program;
    image: ReadonlyMap<number, CellValue>;
    labels: Record<string, number>;
    memory: Record<string, string>;
}

export function src(...lines: string[]): string {
    return lines.join("\n");
}

export function assemble(input: string, opts: AssemblerOptions = {}, tables?: InstructionSet): TestData {
    const data = assembleWithErrors(input, opts, tables);
    if (data.errors.length > 0) {
        throw data.errors[0];
    }
    return data;
}

export function assembleWithErrors(input: string, opts: AssemblerOptions = {}, tables?: InstructionSet): TestData {
    const asm = new Assembler(opts, tables ?? loadPreludeInstructionSet());

    const ast = asm.parseInput("test.asm", input);
    const output = asm.assemble(ast);

    const labels: Record<string, number> = {};
    for (const [name, loc] of output.labels) {
        labels[name] = loc;
    }

    return {
        asm, ast, labels,
        errors: output.errors,
        warnings: output.warnings,
        image: output.image,
        memory: imageToRecord(output.image),
    };
}
