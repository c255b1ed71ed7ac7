/**
 * Command-line front end: turns one PDF into study notes and practice
 * questions, printed to stdout or written to a directory.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
    ConfigurationError,
    StudyAidPipeline,
    createDefaultProvider,
    loadPromptTemplates,
    resolveConfig,
    type Logger,
    type PipelineProgress,
} from "./lib/study-aids";

export interface CliArgs {
    file: string;
    chunkSize?: number;
    overlap?: number;
    maxChars?: number;
    minContent?: number;
    notesTemplate?: string;
    questionsTemplate?: string;
    model?: string;
    out?: string;
    quiet: boolean;
}

const SILENT_LOGGER: Logger = {
    info: () => undefined,
    warn: () => undefined,
    error: (...data: unknown[]) => console.error(...data),
};

export async function parseCliArgs(argv = process.argv): Promise<CliArgs> {
    const parsed = await yargs(hideBin(argv))
        .scriptName("study-aids")
        .usage("$0 <file> [options]\n\nGenerate study notes and practice questions from a PDF")
        .option("chunk-size", {
            type: "number",
            describe: "Target chunk size in words",
        })
        .option("overlap", {
            type: "number",
            describe: "Words shared by consecutive chunks",
        })
        .option("max-chars", {
            type: "number",
            describe: "Maximum characters analysed per document",
        })
        .option("min-content", {
            type: "number",
            describe: "Minimum characters required to generate anything",
        })
        .option("notes-template", {
            type: "string",
            describe: "Prompt template file for notes (remote provider only)",
        })
        .option("questions-template", {
            type: "string",
            describe: "Prompt template file for questions (remote provider only)",
        })
        .option("model", {
            type: "string",
            describe: "OpenAI model used when OPENAI_API_KEY is set",
        })
        .option("out", {
            type: "string",
            describe: "Directory to write notes.md and questions.md into",
        })
        .option("quiet", {
            type: "boolean",
            default: false,
            describe: "Only print the generated study aids",
        })
        .demandCommand(1, "A PDF file is required")
        .help()
        .parse();

    return {
        file: String(parsed._[0]),
        chunkSize: parsed.chunkSize,
        overlap: parsed.overlap,
        maxChars: parsed.maxChars,
        minContent: parsed.minContent,
        notesTemplate: parsed.notesTemplate,
        questionsTemplate: parsed.questionsTemplate,
        model: parsed.model,
        out: parsed.out,
        quiet: parsed.quiet,
    };
}

/** Run the tool and resolve to the process exit code */
export async function runCli(argv = process.argv): Promise<number> {
    const args = await parseCliArgs(argv);
    const logger: Logger = args.quiet ? SILENT_LOGGER : console;

    let pipeline: StudyAidPipeline;
    try {
        const config = resolveConfig({
            chunkSize: args.chunkSize,
            overlap: args.overlap,
            maxChars: args.maxChars,
            minContentLength: args.minContent,
        });
        const templates = await loadPromptTemplates({
            notesPath: args.notesTemplate,
            questionsPath: args.questionsTemplate,
            logger,
        });
        const provider = createDefaultProvider({ model: args.model, config, logger });
        pipeline = new StudyAidPipeline({ config, provider, templates, logger });
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`❌ Invalid configuration: ${error.message}`);
            return 2;
        }
        throw error;
    }

    const onProgress = (progress: PipelineProgress) => {
        if (!args.quiet) {
            console.error(`[${String(progress.percent).padStart(3)}%] ${progress.message}`);
        }
    };

    const result = await pipeline.process(args.file, onProgress);
    if (!result.success) {
        console.error(result.error);
        console.error(result.status);
        return 1;
    }

    if (args.out) {
        await mkdir(args.out, { recursive: true });
        await writeFile(path.join(args.out, "notes.md"), `${result.notes}\n`, "utf-8");
        await writeFile(path.join(args.out, "questions.md"), `${result.questions}\n`, "utf-8");
    }

    console.log(`${result.notes}\n\n${result.questions}`);
    if (!args.quiet) {
        console.error(result.status);
    }
    return 0;
}
