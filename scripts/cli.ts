#!/usr/bin/env node

import { program } from 'commander';
import dotenv from 'dotenv';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigManager, maskSecrets } from '../src/config';
import { chunkTextWithMetadata } from '../src/services/chunker';
import { createServices } from '../src/services';
import { extractText } from '../src/services/textExtraction';
import { ErrorHandler } from '../src/utils/errors';
import { logger } from '../src/utils/logger';

dotenv.config();

interface GlobalOptions {
    config?: string;
}

function loadConfig() {
    const { config } = program.opts<GlobalOptions>();
    return ConfigManager.getInstance().loadConfig(config);
}

function fail(message: string, error: unknown): never {
    logger.error(message, { error: ErrorHandler.toError(error).message });
    console.error(`${message}: ${ErrorHandler.toError(error).message}`);
    process.exit(1);
}

program
    .name('grounded-answer')
    .description('Operator tool for the grounded answer service')
    .version('1.0.0')
    .option('-c, --config <path>', 'JSON configuration file (defaults to environment variables)');

program
    .command('init-index')
    .description('Create the search index, or verify that the existing one matches the configuration')
    .action(async () => {
        try {
            const config = await loadConfig();
            const { searchGateway, cache } = createServices(config);
            await searchGateway.initialize();
            const stats = await searchGateway.getIndexStats();
            console.log(`Index "${config.search.collectionName}" ready (${stats.documentCount} chunks)`);
            await cache?.disconnect();
        } catch (error) {
            fail('Index initialization failed', error);
        }
    });

program
    .command('ingest')
    .description('Extract, chunk, embed and index one or more files')
    .argument('<files...>', 'files to ingest (.pdf, .txt, .md, .docx)')
    .action(async (files: string[]) => {
        try {
            const config = await loadConfig();
            const { searchGateway, documentService, cache } = createServices(config);
            await searchGateway.initialize();

            for (const file of files) {
                const content = await fs.readFile(file);
                const result = await documentService.uploadDocument(path.basename(file), content);
                console.log(`${result.filename}: ${result.chunkCount} chunks (document ${result.parentId})`);
            }
            await cache?.disconnect();
        } catch (error) {
            fail('Ingestion failed', error);
        }
    });

program
    .command('ask')
    .description('Answer a question from the indexed documents')
    .argument('<question>', 'the question to answer')
    .option('-k, --top-k <n>', 'number of chunks to retrieve', value => Number.parseInt(value, 10))
    .action(async (question: string, options: { topK?: number }) => {
        try {
            const config = await loadConfig();
            const { ragService, cache } = createServices(config);
            const response = await ragService.answerQuestion({ message: question, topK: options.topK });

            console.log(response.answer);
            if (response.suggestedActions) {
                console.log(`\nSuggestions: ${response.suggestedActions.join('; ')}`);
            }
            console.log(`\nTokens used: ${response.tokensUsed}`);
            await cache?.disconnect();
        } catch (error) {
            fail('Question failed', error);
        }
    });

program
    .command('chunk')
    .description('Print the chunks a file would be split into, without indexing it')
    .argument('<file>', 'file to chunk')
    .option('-s, --size <words>', 'words per chunk', value => Number.parseInt(value, 10), 500)
    .action(async (file: string, options: { size: number }) => {
        try {
            const content = await fs.readFile(file);
            const text = await extractText(path.basename(file), content);
            const records = chunkTextWithMetadata(text, options.size);
            console.log(JSON.stringify(records, null, 2));
        } catch (error) {
            fail('Chunking failed', error);
        }
    });

program
    .command('config')
    .description('Validate and print the effective configuration')
    .action(async () => {
        try {
            const config = await loadConfig();
            console.log(JSON.stringify(maskSecrets(config), null, 2));
        } catch (error) {
            fail('Configuration is invalid', error);
        }
    });

program.parseAsync().catch((error: unknown) => fail('Command failed', error));
