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

import Logger, { LOG_MODULE_TYPE } from '../../utils/logger';
import { SignatureConfig } from '../../Config';
import { TypeDescriptor, VoidType } from '../base/Type';
import {
    ARRAY_PREFIX,
    CLASS_PREFIX,
    CLASS_SUFFIX,
    INTERNAL_NAME_DELIMITER,
    PACKAGE_DELIMITER,
    PARAMS_END,
    PARAMS_START,
    PRIMITIVE_SIGNATURES,
} from '../common/JniConst';
import { InvalidArgumentError, JniErrorCode } from '../common/JniError';
import { MapSignatureCache, NoopSignatureCache, SignatureCache } from './SignatureCache';

const logger = Logger.getLogger(LOG_MODULE_TYPE.JNISIG, 'JniSignatureGenerator');

export type NullableType = TypeDescriptor | null | undefined;

/**
 * Builds JNI type signatures, e.g. `main([Ljava/lang/String;I)V`, from type descriptors.
 *
 * Every public method validates all of its arguments before building anything,
 * so a rejected call returns no text and leaves the cache as it was.
 *
 * @example
 * ```typescript
 * const generator = new JniSignatureGenerator();
 * generator.generateConstructorSignature(new ClassType('java.lang.String'), IntType.getInstance());
 * // '(Ljava/lang/String;I)V'
 * ```
 */
export class JniSignatureGenerator {
    private cache: SignatureCache;

    constructor(cache: SignatureCache = new MapSignatureCache()) {
        this.cache = cache;
    }

    public static fromConfig(config: SignatureConfig): JniSignatureGenerator {
        return new JniSignatureGenerator(config.isCacheEnabled() ? new MapSignatureCache() : new NoopSignatureCache());
    }

    /**
     * Method signature prefixed with its name, such as `toString()Ljava/lang/String;`.
     */
    public generateSignatureWithMethodName(methodName: string | null | undefined, returnType: NullableType,
                                           ...paramTypes: NullableType[]): string {
        if (methodName === null || methodName === undefined || methodName.length === 0) {
            throw this.invalidArgument(JniErrorCode.METHOD_NAME_EMPTY, 'Method name cannot be null or empty');
        }
        return methodName + this.generateSignature(returnType, ...paramTypes);
    }

    /**
     * Method signature without a name, such as `(Ljava/lang/String;I)Ljava/lang/String;`.
     */
    public generateSignature(returnType: NullableType, ...paramTypes: NullableType[]): string {
        const [validReturnType, validParamTypes] = this.validateTypes(returnType, paramTypes);

        const strs: string[] = [PARAMS_START];
        for (const paramType of validParamTypes) {
            strs.push(this.getTypeSignature(paramType));
        }
        strs.push(PARAMS_END, this.getTypeSignature(validReturnType));
        return strs.join('');
    }

    public generateConstructorSignature(...paramTypes: NullableType[]): string {
        return this.generateSignature(VoidType.getInstance(), ...paramTypes);
    }

    /**
     * Same output as {@link generateSignatureWithMethodName}; keeps call sites for static members readable.
     */
    public generateStaticMethodSignature(methodName: string | null | undefined, returnType: NullableType,
                                         ...paramTypes: NullableType[]): string {
        return this.generateSignatureWithMethodName(methodName, returnType, ...paramTypes);
    }

    /**
     * Signature of a single type, as expected by `GetFieldID`.
     */
    public generateFieldSignature(fieldType: NullableType): string {
        if (fieldType === null || fieldType === undefined) {
            throw this.invalidArgument(JniErrorCode.FIELD_TYPE_UNDEFINED, 'Field type cannot be null');
        }
        this.validateType(fieldType, 'Field type');
        return this.getTypeSignature(fieldType);
    }

    public getCacheSize(): number {
        return this.cache.size();
    }

    public clearCache(): void {
        this.cache.clear();
    }

    private getTypeSignature(type: TypeDescriptor): string {
        if (type.isPrimitive()) {
            return this.getPrimitiveSignature(type, 'Type');
        }

        if (type.isArray()) {
            return ARRAY_PREFIX + this.getTypeSignature(this.getComponentType(type, 'Type'));
        }

        return this.cache.computeIfAbsent(type.getQualifiedName(), (className) => {
            logger.debug(`signature cache miss: ${className}`);
            return CLASS_PREFIX + className.split(PACKAGE_DELIMITER).join(INTERNAL_NAME_DELIMITER) + CLASS_SUFFIX;
        });
    }

    private getPrimitiveSignature(type: TypeDescriptor, argName: string, paramIndex?: number): string {
        const name = type.getQualifiedName();
        const signature = PRIMITIVE_SIGNATURES.get(name);
        if (signature === undefined) {
            throw this.invalidArgument(JniErrorCode.UNKNOWN_PRIMITIVE,
                `${argName} is not a known primitive type: ${name}`, paramIndex);
        }
        return signature;
    }

    private getComponentType(type: TypeDescriptor, argName: string, paramIndex?: number): TypeDescriptor {
        const component = type.getComponentType();
        if (component === null || component === undefined) {
            throw this.invalidArgument(JniErrorCode.ARRAY_COMPONENT_UNDEFINED,
                `${argName} is an array without a component type`, paramIndex);
        }
        return component;
    }

    private validateTypes(returnType: NullableType, paramTypes: NullableType[]): [TypeDescriptor, TypeDescriptor[]] {
        if (returnType === null || returnType === undefined) {
            throw this.invalidArgument(JniErrorCode.RETURN_TYPE_UNDEFINED, 'Return type cannot be null');
        }

        const validParamTypes: TypeDescriptor[] = [];
        for (let i = 0; i < paramTypes.length; i++) {
            const paramType = paramTypes[i];
            if (paramType === null || paramType === undefined) {
                throw this.invalidArgument(JniErrorCode.PARAM_TYPE_UNDEFINED,
                    `Parameter type at index ${i} cannot be null`, i);
            }
            validParamTypes.push(paramType);
        }

        this.validateType(returnType, 'Return type');
        validParamTypes.forEach((paramType, i) => this.validateType(paramType, `Parameter type at index ${i}`, i));
        return [returnType, validParamTypes];
    }

    // walks the array nesting so a broken leaf is rejected before any text is built
    private validateType(type: TypeDescriptor, argName: string, paramIndex?: number): void {
        let current = type;
        while (!current.isPrimitive() && current.isArray()) {
            current = this.getComponentType(current, argName, paramIndex);
        }
        if (current.isPrimitive()) {
            this.getPrimitiveSignature(current, argName, paramIndex);
        }
    }

    private invalidArgument(errCode: JniErrorCode, errMsg: string, paramIndex?: number): InvalidArgumentError {
        logger.error(errMsg);
        return new InvalidArgumentError(errCode, errMsg, paramIndex);
    }
}

let defaultGenerator: JniSignatureGenerator | undefined;

/**
 * The process-wide generator behind the module-level functions, configured from `config/jnisig.json`.
 */
export function getDefaultGenerator(): JniSignatureGenerator {
    if (defaultGenerator === undefined) {
        defaultGenerator = JniSignatureGenerator.fromConfig(new SignatureConfig());
    }
    return defaultGenerator;
}

export function generateSignatureWithMethodName(methodName: string | null | undefined, returnType: NullableType,
                                                ...paramTypes: NullableType[]): string {
    return getDefaultGenerator().generateSignatureWithMethodName(methodName, returnType, ...paramTypes);
}

export function generateSignature(returnType: NullableType, ...paramTypes: NullableType[]): string {
    return getDefaultGenerator().generateSignature(returnType, ...paramTypes);
}

export function generateConstructorSignature(...paramTypes: NullableType[]): string {
    return getDefaultGenerator().generateConstructorSignature(...paramTypes);
}

export function generateStaticMethodSignature(methodName: string | null | undefined, returnType: NullableType,
                                              ...paramTypes: NullableType[]): string {
    return getDefaultGenerator().generateStaticMethodSignature(methodName, returnType, ...paramTypes);
}

export function generateFieldSignature(fieldType: NullableType): string {
    return getDefaultGenerator().generateFieldSignature(fieldType);
}

export function clearCache(): void {
    getDefaultGenerator().clearCache();
}
