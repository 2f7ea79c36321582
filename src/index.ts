#!/usr/bin/env node
import { loadConfig } from './config';
import { createThumbnailClient } from './ThumbnailClientFactory';
import { parseCliArgs, USAGE } from './cli/parseCliArgs';
import { readTopicsFromFile } from './application/TopicList';
import { summarizeResults } from './application/BatchReport';

async function main(): Promise<void> {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
        console.log(USAGE);
        return;
    }

    console.log('📋 Loading configuration...');
    const config = loadConfig();
    const client = createThumbnailClient(config);

    const topics = args.file ? await readTopicsFromFile(args.file) : args.topics;
    if (topics.length === 0) {
        console.error('❌ No topics given');
        console.log(USAGE);
        process.exit(1);
    }

    console.log(`🚀 Starting thumbnail generation for ${topics.length} topic(s)...\n`);
    const results = await client.generateMultipleThumbnails(topics, {
        ...config.generationDefaults,
        ...args.options,
    });

    console.log('\n📊 Generation Results:');
    summarizeResults(results).lines.forEach((line) => console.log(line));
}

main().catch((error) => {
    console.error('❌ Script failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
