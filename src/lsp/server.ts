/**
 * Kernel Analyzer Language Server
 *
 * Re-analyzes a document on open, change and save and publishes its complete
 * diagnostic set, replacing the previous one.
 *
 * @module
 */

import {
  createConnection,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
  type Connection,
  type Diagnostic,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import type { KernelAnalyzer } from "../core/analyzer/index.js";
import { createLogger } from "../utils/logger.js";
import { toDiagnostics } from "./diagnostics.js";

const logger = createLogger("lsp");

export const SERVER_NAME = "kernel-analyzer";
export const SERVER_VERSION = "0.1.0";

/**
 * Diagnostics for one document. Analyzer failures are logged and yield an
 * empty set.
 */
export function diagnoseDocument(analyzer: KernelAnalyzer, uri: string, text: string): Diagnostic[] {
  try {
    const issues = analyzer.analyze(text, uri);
    logger.info({ uri, issues: issues.length }, "Analyzed document");
    return toDiagnostics(issues);
  } catch (error) {
    logger.error({ err: error, uri }, "Error during validation");
    return [];
  }
}

/**
 * Wires the analyzer into a connection. The caller starts listening.
 */
export function registerKernelAnalyzerServer(
  connection: Connection,
  analyzer: KernelAnalyzer
): TextDocuments<TextDocument> {
  const documents = new TextDocuments(TextDocument);

  connection.onInitialize((): InitializeResult => ({
    capabilities: {
      textDocumentSync: {
        openClose: true,
        change: TextDocumentSyncKind.Full,
        save: { includeText: false },
      },
    },
    serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
  }));

  const validate = (document: TextDocument): void => {
    const diagnostics = diagnoseDocument(analyzer, document.uri, document.getText());
    logger.debug({ uri: document.uri, count: diagnostics.length }, "Publishing diagnostics");
    connection.sendDiagnostics({ uri: document.uri, diagnostics }).catch((error: unknown) => {
      logger.error({ err: error, uri: document.uri }, "Failed to publish diagnostics");
    });
  };

  // onDidChangeContent fires on open as well as on change
  documents.onDidChangeContent((event) => validate(event.document));
  documents.onDidSave((event) => validate(event.document));
  documents.onDidClose((event) => {
    connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] }).catch((error: unknown) => {
      logger.error({ err: error, uri: event.document.uri }, "Failed to clear diagnostics");
    });
  });

  connection.onShutdown(async () => {
    logger.info("Shutting down");
    await analyzer.close();
  });

  documents.listen(connection);
  return documents;
}

/**
 * Starts the language server on stdio.
 */
export function startLanguageServer(analyzer: KernelAnalyzer): Connection {
  const connection = createConnection(ProposedFeatures.all, process.stdin, process.stdout);
  registerKernelAnalyzerServer(connection, analyzer);
  connection.listen();
  logger.info("Language server started");
  return connection;
}
