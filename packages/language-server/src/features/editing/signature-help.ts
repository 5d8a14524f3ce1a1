/**
 * Signature Help Handler
 *
 * Overloads of the method being called, with the active parameter.
 */

import type {
    Connection,
    SignatureHelp,
    SignatureInformation,
    TextDocumentPositionParams,
} from 'vscode-languageserver/node.js';
import type { MethodOverload } from '@quill-lsp/analyzer-bridge';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../../services/index.js';
import { toAbortSignal } from '../utils/cancellation.js';

const log = new Logger('SignatureHelp');

function toSignature(overload: MethodOverload): SignatureInformation {
    const signature: SignatureInformation = {
        label: overload.label,
        parameters: overload.parameters.map(p => (p.documentation === undefined
            ? { label: p.label }
            : { label: p.label, documentation: p.documentation })),
    };
    if (overload.documentation !== undefined) {
        signature.documentation = overload.documentation;
    }
    return signature;
}

export async function provideSignatureHelp(
    services: Pick<Services, 'dispatcher'>,
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
): Promise<SignatureHelp | null> {
    const outcome = await services.dispatcher.methods(params.textDocument.uri, params.position, { signal });
    if (outcome.kind !== 'ok' || outcome.value.overloads.length === 0) {
        return null;
    }
    const { overloads, activeParameter } = outcome.value;
    // First overload that takes enough parameters
    const active = overloads.findIndex(o => o.parameters.length > activeParameter);
    return {
        signatures: overloads.map(toSignature),
        activeSignature: active >= 0 ? active : 0,
        activeParameter,
    };
}

/**
 * Register signature help handler.
 */
export function registerSignatureHelpHandler(connection: Connection, services: Services): void {
    connection.onSignatureHelp(async (params, token): Promise<SignatureHelp | null> => {
        try {
            return await provideSignatureHelp(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('Signature help failed', { error: errorMessage(err) });
            return null;
        }
    });
}
