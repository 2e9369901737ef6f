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

import type { Appender, Logger } from 'log4js';
import { configure, getLogger } from 'log4js';

export enum LOG_LEVEL {
    ERROR = 'ERROR',
    WARN = 'WARN',
    INFO = 'INFO',
    DEBUG = 'DEBUG',
    TRACE = 'TRACE',
}

export enum LOG_MODULE_TYPE {
    DEFAULT = 'default',
    JNISIG = 'JniSig',
    TOOL = 'Tool',
}

export function isLogLevel(value: unknown): value is LOG_LEVEL {
    return Object.values(LOG_LEVEL).some((level) => level === value);
}

export default class ConsoleLogger {
    /**
     * Route both categories to a rolling log file, or to stderr when no file is given.
     * stdout is left to the tool's own output. Until this is called log4js keeps every category switched off.
     */
    public static configure(logFilePath: string | undefined, jnisig_level: LOG_LEVEL = LOG_LEVEL.ERROR, tool_level: LOG_LEVEL = LOG_LEVEL.INFO): void {
        const fileAppenders: { [name: string]: Appender } = logFilePath
            ? {
                  file: {
                      type: 'fileSync',
                      filename: logFilePath,
                      maxLogSize: 5 * 1024 * 1024,
                      backups: 5,
                      encoding: 'utf-8',
                      layout: {
                          type: 'pattern',
                          pattern: '[%d] [%p] [%z] [%X{module}] - [%X{tag}] %m',
                      },
                  },
              }
            : {};
        const targets = logFilePath ? ['file'] : ['console'];
        configure({
            appenders: {
                ...fileAppenders,
                console: {
                    type: 'stderr',
                    layout: {
                        type: 'pattern',
                        pattern: '[%d] [%p] [%z] [%X{module}] - %m',
                    },
                },
            },
            categories: {
                default: {
                    appenders: ['console'],
                    level: 'info',
                    enableCallStack: false,
                },
                JniSig: {
                    appenders: targets,
                    level: jnisig_level,
                    enableCallStack: true,
                },
                Tool: {
                    appenders: targets,
                    level: tool_level,
                    enableCallStack: true,
                },
            },
        });
    }

    public static getLogger(log_type: LOG_MODULE_TYPE, tag: string = '-'): Logger {
        let logger: Logger;
        if (log_type === LOG_MODULE_TYPE.DEFAULT || log_type === LOG_MODULE_TYPE.JNISIG) {
            logger = getLogger(log_type);
        } else {
            logger = getLogger(LOG_MODULE_TYPE.TOOL);
        }
        logger.addContext('module', log_type);
        logger.addContext('tag', tag);
        return logger;
    }
}
