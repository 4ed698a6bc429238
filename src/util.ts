export const serializeJson = (json: unknown) =>
    JSON.stringify(json, null, 2) + '\n';

export function parseBoundedInt(value: string, max: number): number | undefined {
    if (!/^\d+$/.test(value)) return undefined;
    return Math.min(parseInt(value, 10), max);
}
