#!/usr/bin/env node
/*
 * Copyright (c) 2024 Huawei Device Co., Ltd.
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { Command } from 'commander';
import { SignatureConfig } from '../Config';
import { InvalidArgumentError } from '../core/common/JniError';
import { JniSignatureGenerator } from '../core/signature/JniSignatureGenerator';
import { parseJavaType, parseJavaTypes } from '../core/signature/JavaTypeParser';
import ConsoleLogger, { LOG_LEVEL, LOG_MODULE_TYPE } from '../utils/logger';

const logger = ConsoleLogger.getLogger(LOG_MODULE_TYPE.TOOL, 'jnisig');

interface GlobalOptions {
    config?: string;
    logFile?: string;
    verbose: boolean;
}

function readGlobalOptions(command: Command): GlobalOptions {
    const opts = command.optsWithGlobals();
    return {
        config: typeof opts.config === 'string' ? opts.config : undefined,
        logFile: typeof opts.logFile === 'string' ? opts.logFile : undefined,
        verbose: opts.verbose === true,
    };
}

// logging must be configured before the config file is read
function loadConfig(options: GlobalOptions): SignatureConfig | undefined {
    const toolLevel = options.verbose ? LOG_LEVEL.DEBUG : LOG_LEVEL.INFO;
    ConsoleLogger.configure(options.logFile, options.verbose ? LOG_LEVEL.DEBUG : LOG_LEVEL.ERROR, toolLevel);

    const config = new SignatureConfig();
    if (options.config !== undefined && !config.buildFromJson(options.config)) {
        return undefined;
    }
    if (!options.verbose) {
        ConsoleLogger.configure(options.logFile, config.getLogLevel(), toolLevel);
    }
    return config;
}

function run(command: Command, produce: (generator: JniSignatureGenerator) => string): void {
    const options = readGlobalOptions(command);
    const config = loadConfig(options);
    if (config === undefined) {
        console.error(`ERROR: Could not load config file: ${options.config}`);
        process.exitCode = 1;
        return;
    }
    try {
        const signature = produce(JniSignatureGenerator.fromConfig(config));
        logger.debug(`generated ${signature}`);
        console.log(signature);
    } catch (error) {
        if (error instanceof InvalidArgumentError) {
            console.error(`ERROR: ${error.message}`);
            process.exitCode = 1;
            return;
        }
        throw error;
    }
}

export function createProgram(): Command {
    const program = new Command()
        .name('jnisig')
        .description('Print JNI type signatures for Java methods, constructors and fields')
        .option('-c, --config <path>', 'JSON configuration file')
        .option('-l, --log-file <path>', 'Write logs to this file instead of stderr')
        .option('-v, --verbose', 'Log at DEBUG level', false);

    program
        .command('method')
        .description('Signature of a method, prefixed with its name')
        .argument('<name>', 'Method name')
        .argument('<returnType>', 'Return type, e.g. void or java.lang.String')
        .argument('[paramTypes...]', 'Parameter types in declaration order')
        .option('-s, --static', 'The method is static (same output)', false)
        .action((name: string, returnType: string, paramTypes: string[], options: { static: boolean },
                 command: Command) => {
            run(command, (generator) => {
                const returnDescriptor = parseJavaType(returnType);
                const paramDescriptors = parseJavaTypes(paramTypes);
                return options.static
                    ? generator.generateStaticMethodSignature(name, returnDescriptor, ...paramDescriptors)
                    : generator.generateSignatureWithMethodName(name, returnDescriptor, ...paramDescriptors);
            });
        });

    program
        .command('ctor')
        .description('Signature of a constructor')
        .argument('[paramTypes...]', 'Parameter types in declaration order')
        .action((paramTypes: string[], _options: object, command: Command) => {
            run(command, (generator) => generator.generateConstructorSignature(...parseJavaTypes(paramTypes)));
        });

    program
        .command('field')
        .description('Signature of a field')
        .argument('<type>', 'Field type')
        .action((type: string, _options: object, command: Command) => {
            run(command, (generator) => generator.generateFieldSignature(parseJavaType(type)));
        });

    return program;
}

if (require.main === module) {
    createProgram().parse(process.argv);
}
