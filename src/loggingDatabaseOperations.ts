/**
 * Logging Wrapper for Database Operations
 *
 * Intercepts calls to DatabaseOperations and logs SQL statements to an
 * output channel.
 */

import type { CellValue, DatabaseOperations, QueryResultSet } from './core/types';
import { isWriteStatement } from './core/sql-utils';
import { timestamp } from './outputChannel';
import type { OutputChannel } from './outputChannel';

/**
 * Mask values that look like personal data or secrets.
 */
export function maskSensitive(message: string): string {
    let safeMessage = message;

    // Email addresses
    safeMessage = safeMessage.replace(/[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, '***@***.***');

    // API keys / tokens with a well-known prefix
    safeMessage = safeMessage.replace(/\b(sk_live_|sk_test_|api_key_|token_|secret_|key_)[a-zA-Z0-9]{10,}\b/gi, '$1[REDACTED]');

    // Long hex strings
    safeMessage = safeMessage.replace(/\b[a-fA-F0-9]{32,}\b/g, '[REDACTED_HEX]');

    return safeMessage;
}

export class LoggingDatabaseOperations implements DatabaseOperations {
    constructor(
        private readonly wrapped: DatabaseOperations,
        private readonly databaseName: () => string,
        private readonly outputChannel: OutputChannel
    ) {}

    private sanitizeValue(value: CellValue): string {
        if (value === null) return 'null';
        if (typeof value === 'string') {
            if (value.length > 100) {
                return `"${value.substring(0, 100)}...[TRUNCATED]"`;
            }
            return `"${value}"`;
        }
        if (value instanceof Uint8Array) {
            return `[BLOB ${value.byteLength} bytes]`;
        }
        return String(value);
    }

    private log(message: string, isWrite: boolean = false) {
        const type = isWrite ? '[WRITE]' : '[read] ';
        this.outputChannel.appendLine(`${timestamp()} ${type} [${this.databaseName()}] ${maskSensitive(message)}`);
    }

    async executeQuery(sql: string, params?: CellValue[]): Promise<QueryResultSet[]> {
        const paramStr = params && params.length > 0 ? ` -- params: [${params.map(p => this.sanitizeValue(p)).join(', ')}]` : '';
        this.log(`${sql}${paramStr}`, isWriteStatement(sql));
        return this.wrapped.executeQuery(sql, params);
    }

    async listTables(filter?: string): Promise<string[]> {
        this.log(filter ? `List tables matching "${filter}"` : 'List tables');
        return this.wrapped.listTables(filter);
    }

    async ping(): Promise<boolean> {
        return this.wrapped.ping();
    }
}
