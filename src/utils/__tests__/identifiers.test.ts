/**
 * Unit tests for identifier validation
 */

import { describe, it, expect } from 'vitest';
import { validateIdentifier, InvalidIdentifierError } from '../../utils/identifiers.js';

describe('Identifier Validation', () => {
    describe('validateIdentifier', () => {
        it('should accept valid simple identifiers', () => {
            expect(() => validateIdentifier('payment')).not.toThrow();
            expect(() => validateIdentifier('lesson_payment')).not.toThrow();
            expect(() => validateIdentifier('_private')).not.toThrow();
            expect(() => validateIdentifier('Enrolment2')).not.toThrow();
        });

        it('should accept valid identifiers with $', () => {
            expect(() => validateIdentifier('audit$log')).not.toThrow();
        });

        it('should reject identifiers starting with numbers', () => {
            expect(() => validateIdentifier('1table')).toThrow(InvalidIdentifierError);
        });

        it('should reject identifiers with special characters', () => {
            expect(() => validateIdentifier('table-name')).toThrow(InvalidIdentifierError);
            expect(() => validateIdentifier('table;name')).toThrow(InvalidIdentifierError);
            expect(() => validateIdentifier('table name')).toThrow(InvalidIdentifierError);
            expect(() => validateIdentifier('`payment`')).toThrow(InvalidIdentifierError);
        });

        it('should reject SQL injection attempts', () => {
            expect(() => validateIdentifier("payment' OR '1'='1")).toThrow(InvalidIdentifierError);
        });

        it('should explain that database-qualified names are not supported', () => {
            expect(() => validateIdentifier('other_db.payment')).toThrow(
                'Invalid identifier "other_db.payment": Database-qualified names (db.table) are not supported; tables are resolved in the configured database'
            );
        });

        it('should reject empty strings', () => {
            expect(() => validateIdentifier('')).toThrow(
                'Invalid identifier "": Identifier must be a non-empty string'
            );
        });

        it('should reject oversized identifiers (>64 chars)', () => {
            expect(() => validateIdentifier('a'.repeat(65))).toThrow(
                'Identifier exceeds maximum length of 64 characters'
            );
            expect(() => validateIdentifier('a'.repeat(64))).not.toThrow();
        });

        it('should carry the identifier and reason', () => {
            try {
                validateIdentifier('bad-name');
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(InvalidIdentifierError);
                expect(error).toMatchObject({
                    name: 'InvalidIdentifierError',
                    identifier: 'bad-name'
                });
            }
        });
    });
});
