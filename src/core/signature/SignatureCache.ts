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

/**
 * Memoizes the `L<internal name>;` fragment of a class by its qualified name.
 * An entry never goes stale: a class name always maps to the same fragment.
 */
export interface SignatureCache {
    /**
     * Returns the fragment stored for `className`, computing and storing it first on a miss.
     */
    computeIfAbsent(className: string, mapping: (className: string) => string): string;

    has(className: string): boolean;

    size(): number;

    clear(): void;
}

export class MapSignatureCache implements SignatureCache {
    private signatures: Map<string, string> = new Map<string, string>();

    public computeIfAbsent(className: string, mapping: (className: string) => string): string {
        const cached = this.signatures.get(className);
        if (cached !== undefined) {
            return cached;
        }
        const signature = mapping(className);
        this.signatures.set(className, signature);
        return signature;
    }

    public has(className: string): boolean {
        return this.signatures.has(className);
    }

    public size(): number {
        return this.signatures.size;
    }

    public clear(): void {
        this.signatures.clear();
    }
}

// used when caching is switched off in the config
export class NoopSignatureCache implements SignatureCache {
    public computeIfAbsent(className: string, mapping: (className: string) => string): string {
        return mapping(className);
    }

    public has(_className: string): boolean {
        return false;
    }

    public size(): number {
        return 0;
    }

    public clear(): void {
        return;
    }
}
