import fs from 'fs';
import { loadConfig } from '../src/config';
import { createThumbnailClient } from '../src/ThumbnailClientFactory';
import { readTopicsFromFile } from '../src/application/TopicList';
import { summarizeResults } from '../src/application/BatchReport';

/**
 * Generates thumbnails for every course listed in a text file.
 * Usage: generate_from_file [path]  (defaults to COURSES_FILE, then course.txt)
 */
async function main(): Promise<void> {
    console.log('📚 Course Thumbnail Generator from File\n');

    const config = loadConfig();
    const client = createThumbnailClient(config);
    const coursesFile = process.argv[2] || config.coursesFile;

    if (!fs.existsSync(coursesFile)) {
        console.error(`❌ File '${coursesFile}' not found!`);
        console.log(`📝 Please create '${coursesFile}' with your course names (one per line)`);
        process.exit(1);
    }

    const topics = await readTopicsFromFile(coursesFile);
    if (topics.length === 0) {
        console.error(`❌ No course names found in '${coursesFile}'`);
        console.log('📝 Please add your course names to the file (one per line)');
        process.exit(1);
    }

    console.log(`📖 Found ${topics.length} courses in '${coursesFile}':`);
    topics.forEach((topic, i) => console.log(`${i + 1}. ${topic}`));

    console.log('\n🚀 Starting thumbnail generation...\n');
    const results = await client.generateMultipleThumbnails(topics, config.generationDefaults);

    console.log('\n📊 Results Summary:');
    const summary = summarizeResults(results);
    summary.lines.forEach((line) => console.log(line));

    if (summary.successCount > 0) {
        console.log(`\n📂 Check the "${config.outputDir}" folder for your generated images!`);
    }
}

main().catch((error) => {
    console.error('❌ Script failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
