export const DEFAULT_READ_SPEED = "light" as const;

// Bulk entity reads: two RPC calls per entity.
export const READ_SPEED_PROFILES = {
    light: {maxRps: 10, maxConcurrency: 4},
    medium: {maxRps: 50, maxConcurrency: 16},
    heavy: {maxRps: 0, maxConcurrency: 64},
} satisfies Record<string, { maxRps: number; maxConcurrency: number }>;

export type ReadSpeed = keyof typeof READ_SPEED_PROFILES;

const isReadSpeed = (value: string): value is ReadSpeed =>
    Object.prototype.hasOwnProperty.call(READ_SPEED_PROFILES, value);

export const resolveReadSpeed = (speed?: string): ReadSpeed => {
    if (typeof speed === "string" && isReadSpeed(speed)) {
        return speed;
    }
    return DEFAULT_READ_SPEED;
};
