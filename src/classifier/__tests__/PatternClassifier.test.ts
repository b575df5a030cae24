import { PatternClassifier } from '../PatternClassifier';
import { Dependency } from '../../models/Dependency';

function dependency(name: string): Dependency {
    return {
        name,
        version: '1.0.0',
        constraint: '1.0.0',
        minVersion: '1.0.0',
        maxVersion: '1.0.0',
        isInternal: false,
        ecosystem: 'npm',
    };
}

describe('PatternClassifier', () => {
    describe('isInternal', () => {
        it.each([
            ['github.com/company/*', 'github.com/company/user-service', true],
            ['github.com/company/*', 'github.com/gin-gonic/gin', false],
            ['github.com/company/*', 'github.com/company/tools/lint', false],
            ['@company/', '@company/ui-components', true],
            ['@company/', '@angular/core', false],
            ['com.company.', 'com.company.platform:core', true],
            ['.internal', 'billing.internal', true],
            ['/sdk', 'github.com/company/sdk', true],
            ['company-', 'company-utils', true],
            ['company-', 'my-company-utils', true],
            ['company-', 'acme-utils', false],
            ['lodash', 'lodash', true],
            ['Company', 'company-utils', false],
        ])('pattern %p against %p is %p', (pattern, name, expected) => {
            expect(new PatternClassifier([pattern]).isInternal(dependency(name))).toBe(expected);
        });

        it('is internal when any of several patterns matches', () => {
            const classifier = new PatternClassifier(['@company/', 'github.com/company/*']);

            expect(classifier.isInternal(dependency('github.com/company/auth'))).toBe(true);
            expect(classifier.isInternal(dependency('@company/auth'))).toBe(true);
            expect(classifier.isInternal(dependency('express'))).toBe(false);
        });

        it('treats everything as external without patterns', () => {
            expect(new PatternClassifier([]).isInternal(dependency('@company/auth'))).toBe(false);
        });

        it('treats an empty or missing dependency as external', () => {
            const classifier = new PatternClassifier(['company']);

            expect(classifier.isInternal(dependency(''))).toBe(false);
            expect(classifier.isInternal(null)).toBe(false);
            expect(classifier.isInternal(undefined)).toBe(false);
        });

        it('does not let a wildcard pattern match as a substring', () => {
            const classifier = new PatternClassifier(['company*']);

            expect(classifier.isInternal(dependency('company-utils'))).toBe(true);
            expect(classifier.isInternal(dependency('my-company-utils'))).toBe(false);
        });
    });

    describe('classifyDependencies', () => {
        const classifier = new PatternClassifier(['@company/']);

        it('sets flags in place and returns the same array', () => {
            const dependencies = [dependency('@company/ui'), dependency('react')];

            const result = classifier.classifyDependencies(dependencies);

            expect(result).toBe(dependencies);
            expect(dependencies.map((d) => d.isInternal)).toEqual([true, false]);
        });

        it('skips missing elements', () => {
            const internal = dependency('@company/ui');
            const dependencies = [null, internal, undefined];

            const result = classifier.classifyDependencies(dependencies);

            expect(result).toEqual([null, { ...internal, isInternal: true }, undefined]);
        });

        it('returns a missing collection unchanged', () => {
            expect(classifier.classifyDependencies(null)).toBeNull();
            expect(classifier.classifyDependencies(undefined)).toBeUndefined();
        });

        it('is idempotent and matches classifying each element alone', () => {
            const names = ['@company/ui', 'react', '@company/api', 'company', '@angular/core'];
            const first = classifier.classifyDependencies(names.map(dependency)).map((d) => d.isInternal);
            const again = classifier.classifyDependencies(names.map(dependency)).map((d) => d.isInternal);
            const oneByOne = names.map((name) => classifier.isInternal(dependency(name)));

            expect(first).toEqual([true, false, true, false, false]);
            expect(again).toEqual(first);
            expect(oneByOne).toEqual(first);
        });
    });
});
