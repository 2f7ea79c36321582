/**
 * Prompt construction for course thumbnails.
 * Everything here is a fixed template; no model is involved.
 */

const FILLER_WORDS = /\b(introduction to|intro to|fundamentals|basics|beginner|complete|masterclass|course|101)\b/gi;

/**
 * Derives the short uppercase hook rendered on the thumbnail.
 *
 * "Machine Learning Basics" -> "MASTER MACHINE LEARNING"
 * "Effective Business Communication" -> "EFFECTIVE BUSINESS COMMUNICATION"
 */
export function generateHookText(topic: string): string {
    let text = topic.replace(FILLER_WORDS, '').replace(/\s+/g, ' ').trim();
    if (!text) {
        text = topic.replace(/\s+/g, ' ').trim();
    }

    const words = text.split(' ');
    const hook = words.length <= 2 ? `Master ${text}` : words.slice(0, 3).join(' ');

    return hook.toUpperCase();
}

export function buildThumbnailPrompt(topic: string, hookText: string, style: string): string {
    return `Design a YouTube-style course thumbnail for "${topic}" with ONLY two elements:
1) the EXACT hook text: "${hookText}" (render this as the ONLY text)
2) a professional person portrait (waist-up or headshot) looking at camera

Composition and style:
- Overall look: ${style}, modern, minimal, premium
- Text on one side, person on the other; clear separation
- Vibrant, colorful background (solid or subtle gradient) with strong contrast
- Big typography; subtle outline/shadow allowed for readability

Strict constraints:
- Render ONLY this text: "${hookText}". No other words, numbers, badges, subtitles or symbols
- ZERO logos or branding of any kind
- NO timestamps, durations, playlists, counters, watermarks or corner tags
- NO UI elements: buttons, menus, play buttons, progress bars, profile chips
- NO random small or fake text anywhere

Content rules:
- One person (max two); business-casual attire; friendly, confident expression
- Keep the layout uncluttered and educational; emphasize the hook text and the person only`;
}
