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

import {
    ARRAY_BRACKETS,
    BOOLEAN_KEYWORD,
    BYTE_KEYWORD,
    CHAR_KEYWORD,
    DOUBLE_KEYWORD,
    FLOAT_KEYWORD,
    INT_KEYWORD,
    LONG_KEYWORD,
    PrimitiveKind,
    SHORT_KEYWORD,
    VOID_KEYWORD,
} from '../common/JniConst';

/**
 * What the signature generator needs to know about a type.
 * Implement it over any reflection facility, or use the classes below.
 * @category core/base/type
 */
export interface TypeDescriptor {
    isPrimitive(): boolean;

    isArray(): boolean;

    /**
     * Returns the element type of an array, or `null` for anything else.
     */
    getComponentType(): TypeDescriptor | null;

    /**
     * Returns the `.`-separated fully-qualified name, such as `java.lang.String`.
     * Primitive types return their keyword.
     */
    getQualifiedName(): string;
}

/**
 * @category core/base/type
 */
export abstract class Type implements TypeDescriptor {
    public isPrimitive(): boolean {
        return false;
    }

    public isArray(): boolean {
        return false;
    }

    public getComponentType(): TypeDescriptor | null {
        return null;
    }

    abstract getQualifiedName(): string;

    abstract toString(): string;
}

/**
 * @category core/base/type
 */
export abstract class PrimitiveType extends Type {
    private name: PrimitiveKind;

    constructor(name: PrimitiveKind) {
        super();
        this.name = name;
    }

    public getName(): PrimitiveKind {
        return this.name;
    }

    public isPrimitive(): boolean {
        return true;
    }

    public getQualifiedName(): string {
        return this.name;
    }

    public toString(): string {
        return this.name;
    }
}

export class VoidType extends PrimitiveType {
    private static readonly INSTANCE = new VoidType();

    constructor() {
        super(VOID_KEYWORD);
    }

    public static getInstance(): VoidType {
        return this.INSTANCE;
    }
}

export class BooleanType extends PrimitiveType {
    private static readonly INSTANCE = new BooleanType();

    constructor() {
        super(BOOLEAN_KEYWORD);
    }

    public static getInstance(): BooleanType {
        return this.INSTANCE;
    }
}

export class ByteType extends PrimitiveType {
    private static readonly INSTANCE = new ByteType();

    constructor() {
        super(BYTE_KEYWORD);
    }

    public static getInstance(): ByteType {
        return this.INSTANCE;
    }
}

export class CharType extends PrimitiveType {
    private static readonly INSTANCE = new CharType();

    constructor() {
        super(CHAR_KEYWORD);
    }

    public static getInstance(): CharType {
        return this.INSTANCE;
    }
}

export class ShortType extends PrimitiveType {
    private static readonly INSTANCE = new ShortType();

    constructor() {
        super(SHORT_KEYWORD);
    }

    public static getInstance(): ShortType {
        return this.INSTANCE;
    }
}

export class IntType extends PrimitiveType {
    private static readonly INSTANCE = new IntType();

    constructor() {
        super(INT_KEYWORD);
    }

    public static getInstance(): IntType {
        return this.INSTANCE;
    }
}

export class LongType extends PrimitiveType {
    private static readonly INSTANCE = new LongType();

    constructor() {
        super(LONG_KEYWORD);
    }

    public static getInstance(): LongType {
        return this.INSTANCE;
    }
}

export class FloatType extends PrimitiveType {
    private static readonly INSTANCE = new FloatType();

    constructor() {
        super(FLOAT_KEYWORD);
    }

    public static getInstance(): FloatType {
        return this.INSTANCE;
    }
}

export class DoubleType extends PrimitiveType {
    private static readonly INSTANCE = new DoubleType();

    constructor() {
        super(DOUBLE_KEYWORD);
    }

    public static getInstance(): DoubleType {
        return this.INSTANCE;
    }
}

export function getPrimitiveType(kind: PrimitiveKind): PrimitiveType {
    switch (kind) {
        case VOID_KEYWORD:
            return VoidType.getInstance();
        case BOOLEAN_KEYWORD:
            return BooleanType.getInstance();
        case BYTE_KEYWORD:
            return ByteType.getInstance();
        case CHAR_KEYWORD:
            return CharType.getInstance();
        case SHORT_KEYWORD:
            return ShortType.getInstance();
        case INT_KEYWORD:
            return IntType.getInstance();
        case LONG_KEYWORD:
            return LongType.getInstance();
        case FLOAT_KEYWORD:
            return FloatType.getInstance();
        case DOUBLE_KEYWORD:
            return DoubleType.getInstance();
    }
}

/**
 * A reference type identified by its fully-qualified name, e.g. `java.lang.String`.
 * @category core/base/type
 */
export class ClassType extends Type {
    private qualifiedName: string;

    constructor(qualifiedName: string) {
        super();
        this.qualifiedName = qualifiedName;
    }

    public getQualifiedName(): string {
        return this.qualifiedName;
    }

    public toString(): string {
        return this.qualifiedName;
    }
}

/**
 * One level of array nesting; `int[][]` is an ArrayType whose component is the ArrayType of `int`.
 * @category core/base/type
 */
export class ArrayType extends Type {
    private componentType: TypeDescriptor;

    constructor(componentType: TypeDescriptor) {
        super();
        this.componentType = componentType;
    }

    /**
     * Wraps `baseType` in `dimension` levels of array.
     */
    public static of(baseType: TypeDescriptor, dimension: number): TypeDescriptor {
        let type = baseType;
        for (let i = 0; i < dimension; i++) {
            type = new ArrayType(type);
        }
        return type;
    }

    public isArray(): boolean {
        return true;
    }

    public getComponentType(): TypeDescriptor {
        return this.componentType;
    }

    /**
     * Returns the innermost non-array type.
     */
    public getBaseType(): TypeDescriptor {
        let type: TypeDescriptor = this.componentType;
        let component = type.isArray() ? type.getComponentType() : null;
        while (component !== null) {
            type = component;
            component = type.isArray() ? type.getComponentType() : null;
        }
        return type;
    }

    public getDimension(): number {
        let dimension = 1;
        let type: TypeDescriptor = this.componentType;
        let component = type.isArray() ? type.getComponentType() : null;
        while (component !== null) {
            dimension++;
            type = component;
            component = type.isArray() ? type.getComponentType() : null;
        }
        return dimension;
    }

    public getQualifiedName(): string {
        return this.toString();
    }

    public toString(): string {
        const strs: string[] = [this.getBaseType().getQualifiedName()];
        const dimension = this.getDimension();
        for (let i = 0; i < dimension; i++) {
            strs.push(ARRAY_BRACKETS);
        }
        return strs.join('');
    }
}
