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

export enum JniErrorCode {
    OK = 0,
    RETURN_TYPE_UNDEFINED = -1,
    PARAM_TYPE_UNDEFINED = -2,
    METHOD_NAME_EMPTY = -3,
    UNKNOWN_PRIMITIVE = -4,
    ARRAY_COMPONENT_UNDEFINED = -5,
    MALFORMED_TYPE_NAME = -6,
    FIELD_TYPE_UNDEFINED = -7,
}

export interface JniError {
    errCode: JniErrorCode;
    errMsg?: string;
}

/**
 * Raised for any argument the signature generator cannot encode.
 * `paramIndex` is set when the offending argument is a parameter type.
 */
export class InvalidArgumentError extends Error implements JniError {
    public readonly errCode: JniErrorCode;
    public readonly errMsg: string;
    public readonly paramIndex?: number;

    constructor(errCode: JniErrorCode, errMsg: string, paramIndex?: number) {
        super(errMsg);
        this.name = 'InvalidArgumentError';
        this.errCode = errCode;
        this.errMsg = errMsg;
        this.paramIndex = paramIndex;
        Object.setPrototypeOf(this, InvalidArgumentError.prototype);
    }
}
