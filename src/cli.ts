#!/usr/bin/env node
import {Command} from "commander";
import inquirer from "inquirer";
import path from "path";
import ProtoLoader from "./helpers/ProtoLoader";
import makeOpenApi from "./makeOpenApi";
import {GeneratorOptions} from "./types";

interface GenerateCommandOptions {
    yes?: boolean;
    proto?: string[];
    title?: string;
    version?: string;
}

const DEFAULT_VERSION = "1.0.0";

const program = new Command();

async function getDefaultTitle(protoInputs: string[]): Promise<string> {
    try {
        const descriptors = await ProtoLoader.load(protoInputs);
        const name = descriptors.packageName || descriptors.services[0]?.name || "";
        return name ? `${name} API` : "API";
    } catch (error) {
        console.warn("Warning: Could not parse proto files for default title");
        return "API";
    }
}

const splitInputs = (input: string): string[] =>
    input.split(",").map((value) => value.trim()).filter(Boolean);

async function promptForOptions(outputPath: string, options: GenerateCommandOptions): Promise<GeneratorOptions> {
    let protoInputs = options.proto ?? [];
    if (protoInputs.length === 0) {
        const protoAnswer = await inquirer.prompt<{ protoInputs: string }>([
            {
                type: "input",
                name: "protoInputs",
                message: "Enter the proto files or URLs (comma separated):",
                validate: (input: string) => {
                    if (splitInputs(input).length === 0) {
                        return "At least one proto file is required";
                    }
                    return true;
                }
            }
        ]);
        protoInputs = splitInputs(protoAnswer.protoInputs);
    }

    // The package of the first proto file gives the default title
    const defaultTitle = options.title ?? await getDefaultTitle(protoInputs);

    const remainingAnswers = await inquirer.prompt<{ title: string; version: string }>([
        {
            type: "input",
            name: "title",
            message: "Enter the API title:",
            default: defaultTitle,
            when: () => !options.title,
            validate: (input: string) => {
                if (!input.trim()) {
                    return "API title is required";
                }
                return true;
            }
        },
        {
            type: "input",
            name: "version",
            message: "Enter the API version:",
            default: DEFAULT_VERSION,
            when: () => !options.version,
            validate: (input: string) => {
                if (!input.trim()) {
                    return "API version is required";
                }
                return true;
            }
        }
    ]);

    return {
        protoInputs,
        outputPath: path.resolve(outputPath),
        title: options.title ?? remainingAnswers.title,
        version: options.version ?? remainingAnswers.version
    };
}

program
    .name("protopath")
    .description("Generate an OpenAPI document from annotated protobuf services")
    .version("1.0.0")
    .enablePositionalOptions();

program
    .command("generate")
    .description("Generate the OpenAPI document")
    .argument("<output>", "Output file (.yaml, .yml or .json)")
    .option("-y, --yes", "Skip prompts and use command line options")
    .option("-p, --proto <files...>", "Proto files or URLs to read")
    .option("-t, --title <title>", "Title of the API")
    .option("--version <version>", "Version of the API")
    .action(async (output: string, options: GenerateCommandOptions) => {
        let generatorOptions: GeneratorOptions;

        if (options.yes) {
            if (!options.proto || options.proto.length === 0) {
                console.error("Error: When using --yes flag, at least one --proto option is required.");
                process.exit(1);
            }

            generatorOptions = {
                protoInputs: options.proto,
                outputPath: path.resolve(output),
                title: options.title ?? await getDefaultTitle(options.proto),
                version: options.version ?? DEFAULT_VERSION
            };
        } else {
            try {
                generatorOptions = await promptForOptions(output, options);
            } catch (error) {
                console.error("Error during prompt:", error);
                process.exit(1);
            }
        }

        try {
            console.log("\nGenerating OpenAPI document with options:", generatorOptions);
            await makeOpenApi(generatorOptions);
            console.log("OpenAPI document generated successfully!");
        } catch (error) {
            console.error("Error generating OpenAPI document:", error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
