import { GenerationResult } from '../domain/entities/Thumbnail';

export interface BatchSummary {
    successCount: number;
    failureCount: number;
    lines: string[];
}

/**
 * Formats batch results as the console report printed by the CLI.
 */
export function summarizeResults(results: readonly GenerationResult[]): BatchSummary {
    const lines: string[] = [];
    let successCount = 0;
    let failureCount = 0;

    results.forEach((result, i) => {
        const index = i + 1;
        if (result.success) {
            successCount++;
            lines.push(`✅ ${index}. ${result.topic}`);
            lines.push(`   📁 Saved to: ${result.filePath}`);
        } else {
            failureCount++;
            lines.push(`❌ ${index}. ${result.topic}`);
            lines.push(`   💥 Error: ${result.error}`);
        }
    });

    lines.push(`🎯 Summary: ${successCount} successful, ${failureCount} failed`);

    return { successCount, failureCount, lines };
}
