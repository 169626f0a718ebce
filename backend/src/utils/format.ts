const UNITS: Record<string, number> = {
    K: 1024,
    M: 1024 ** 2,
    G: 1024 ** 3,
    T: 1024 ** 4
};

/**
 * Parses JVM-style memory settings ("512M", "4G", "2048k") into bytes.
 * Returns null for anything the JVM would reject.
 */
export function parseMemorySetting(value: string): number | null {
    const match = value.trim().match(/^(\d+)([KMGT])?$/i);
    if (!match) return null;
    const amount = parseInt(match[1], 10);
    if (amount <= 0) return null;
    const unit = match[2] ? UNITS[match[2].toUpperCase()] : 1;
    return amount * unit;
}

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    const mb = bytes / 1024 ** 2;
    if (mb < 1024) return `${mb.toFixed(1)} MB`;
    return `${(mb / 1024).toFixed(2)} GB`;
}

export function formatUptime(seconds: number): string {
    const s = Math.max(0, Math.floor(seconds));
    const days = Math.floor(s / 86400);
    const hours = Math.floor((s % 86400) / 3600);
    const minutes = Math.floor((s % 3600) / 60);
    const secs = s % 60;
    if (days > 0) return `${days}d ${hours}h ${minutes}m`;
    if (hours > 0) return `${hours}h ${minutes}m ${secs}s`;
    if (minutes > 0) return `${minutes}m ${secs}s`;
    return `${secs}s`;
}
