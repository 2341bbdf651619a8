import fetch from 'node-fetch';
import { isIP } from 'net';
import { config } from '../config/environment';

export interface ResolvedLocation {
    latitude: number | null;
    longitude: number | null;
    address: string;
}

export const UNKNOWN_ADDRESS = 'Unknown';

export const unknownLocation = (): ResolvedLocation => ({
    latitude: null,
    longitude: null,
    address: UNKNOWN_ADDRESS
});

/**
 * Maps the caller's network vantage point to an approximate place.
 * Implementations never reject: a failed lookup is an unknown location.
 */
export interface LocationResolver {
    resolveCurrentLocation(clientIp?: string): Promise<ResolvedLocation>;
}

export interface GeolocationOptions {
    apiUrl: string;
    apiToken?: string;
    timeoutMs: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parse a `"lat,lng"` pair. Both halves must be finite numbers or neither is used.
 */
export function parseCoordinates(loc: unknown): Pick<ResolvedLocation, 'latitude' | 'longitude'> {
    if (typeof loc !== 'string') {
        return { latitude: null, longitude: null };
    }

    const parts = loc.split(',');
    if (parts.length !== 2) {
        return { latitude: null, longitude: null };
    }

    const [latitude, longitude] = parts.map(part => (part.trim() === '' ? NaN : Number(part)));
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
        return { latitude: null, longitude: null };
    }

    return { latitude, longitude };
}

/**
 * Join the locality, region and country that are present with ", ".
 */
export function composeAddress(parts: unknown[]): string {
    const present = parts.filter((part): part is string => typeof part === 'string' && part.trim() !== '');
    return present.length > 0 ? present.map(part => part.trim()).join(', ') : UNKNOWN_ADDRESS;
}

/**
 * Strip the IPv4-mapped IPv6 prefix Node reports for IPv4 peers.
 */
export function normalizeIp(ip: string | undefined): string | undefined {
    if (!ip) {
        return undefined;
    }
    return ip.startsWith('::ffff:') ? ip.slice('::ffff:'.length) : ip;
}

/**
 * Whether a geolocation service can say anything useful about this address.
 * Loopback, private, link-local and unparsable addresses cannot be located.
 */
export function isPublicAddress(ip: string): boolean {
    const version = isIP(ip);

    if (version === 4) {
        const [a, b] = ip.split('.').map(Number);
        if (a === 10 || a === 127 || a === 0) return false;
        if (a === 169 && b === 254) return false;
        if (a === 172 && b >= 16 && b <= 31) return false;
        if (a === 192 && b === 168) return false;
        if (a === 100 && b >= 64 && b <= 127) return false;
        return true;
    }

    if (version === 6) {
        const lower = ip.toLowerCase();
        if (lower === '::1' || lower === '::') return false;
        if (lower.startsWith('fc') || lower.startsWith('fd')) return false;
        if (lower.startsWith('fe80')) return false;
        return true;
    }

    return false;
}

export function toResolvedLocation(body: unknown): ResolvedLocation {
    if (!isRecord(body)) {
        throw new Error('Malformed geolocation response');
    }

    return {
        ...parseCoordinates(body.loc),
        address: composeAddress([body.city, body.region, body.country])
    };
}

/**
 * IP geolocation over HTTP against an ipinfo-compatible API.
 */
export class IpLocationService implements LocationResolver {
    constructor(private readonly options: GeolocationOptions = config.geolocation) { }

    /**
     * A public client address is looked up directly; otherwise the service
     * reports on the server's own address.
     */
    buildUrl(clientIp?: string): string {
        const ip = normalizeIp(clientIp);
        const path = ip && isPublicAddress(ip) ? `/${ip}/json` : '/json';
        return `${this.options.apiUrl}${path}`;
    }

    async resolveCurrentLocation(clientIp?: string): Promise<ResolvedLocation> {
        const url = this.buildUrl(clientIp);

        try {
            const res = await fetch(url, {
                headers: {
                    Accept: 'application/json',
                    ...(this.options.apiToken ? { Authorization: `Bearer ${this.options.apiToken}` } : {})
                },
                timeout: this.options.timeoutMs
            });

            if (!res.ok) {
                throw new Error(`Geolocation API ${res.status}`);
            }

            const body: unknown = await res.json();
            return toResolvedLocation(body);
        } catch (error) {
            console.warn('Location lookup failed, recording location as unknown:', {
                url,
                error: error instanceof Error ? error.message : String(error)
            });
            return unknownLocation();
        }
    }
}
