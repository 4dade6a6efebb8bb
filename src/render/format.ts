/**
 * @file Report Formatting Helpers
 *
 * @module render/format
 */

const SIZE_UNITS: readonly string[] = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

/**
 * Formats a byte count into a human-readable size string using 1024 steps.
 *
 * @example
 * size_format(512);     // '512 B'
 * size_format(4300);    // '4.2 KB'
 * size_format(5 * 1024 ** 3); // '5.0 GB'
 */
export function size_format(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    let value: number = bytes;
    let unit: number = 0;
    while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
        value /= 1024;
        unit++;
    }
    return `${value.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

/**
 * Local date and time as `YYYY-MM-DD HH:mm:ss`.
 */
export function time_format(date: Date): string {
    const pad = (value: number): string => String(value).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function html_escape(content: string): string {
    return content
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}
