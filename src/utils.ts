/**
 * Utility functions for the realtime client.
 */

/**
 * Truncate long strings for trace output.
 */
export function truncate(text: string, maxLength: number = 1000): string {
    if (text.length > maxLength) {
        return `${text.slice(0, maxLength)}... (truncated, ${text.length} total chars)`;
    }
    return text;
}
