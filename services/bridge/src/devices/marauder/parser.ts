// services/bridge/src/devices/marauder/parser.ts

import type { MarauderEvent, ScanType } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Grammar                                                                   */
/* -------------------------------------------------------------------------- */

const MAC = '[0-9A-Fa-f]{2}(?::[0-9A-Fa-f]{2}){5}'

/**
 * Informational output the firmware prints alongside scan results.
 * Matched before anything else so it never reaches the discovery patterns.
 */
const IGNORED: RegExp[] = [
    /^\s*Beacon\s*(?:Detail|Details|Frame|Interval)s?\s*:/i,
    /^\s*Beacon\s+sniff/i,
]

//  -42 ESSID: MyNetwork Ch: 6 BSSID: AA:BB:CC:DD:EE:FF
const RE_AP_SSID_FIRST = new RegExp(
    `^\\s*(-?\\d+)\\s+ESSID:\\s*(.*?)\\s+Ch:\\s*(\\d+)\\s+BSSID:\\s*(${MAC})\\s*$`,
    'i'
)

//  -42 Ch: 6 BSSID: AA:BB:CC:DD:EE:FF ESSID: MyNetwork
const RE_AP_BSSID_FIRST = new RegExp(
    `^\\s*(-?\\d+)\\s+Ch:\\s*(\\d+)\\s+BSSID:\\s*(${MAC})\\s+ESSID:\\s*(.*?)\\s*$`,
    'i'
)

//  -55 Station: AA:BB:CC:DD:EE:FF Associated: 11:22:33:44:55:66
const RE_STATION = new RegExp(
    `^\\s*(-?\\d+)\\s+Station:\\s*(${MAC})\\s+Associated:\\s*(${MAC})\\s*$`,
    'i'
)

//  -80 Device: [LG] webOS TV UP7550PSF
const RE_BLE_NAMED = /^\s*(-?\d+)\s+Device:\s*\[(.+?)\]\s*(.*?)\s*$/i

//  -73 Device: 63:C6:BB:7B:D1:1C
const RE_BLE_MAC = new RegExp(`^\\s*(-?\\d+)\\s+Device:\\s*(${MAC})\\s*$`, 'i')

const SCAN_STARTED: Array<[RegExp, ScanType]> = [
    [/Starting WiFi scan/i, 'wifi'],
    [/Starting Bluetooth scan/i, 'bluetooth'],
    [/Start(?:ed|ing) AP scan/i, 'ap'],
    [/Start(?:ed|ing) Station scan/i, 'station'],
]

const RE_SCAN_STOPPED = /(Shutting down BLE|Stopping WiFi|stopscan)/i

// CLI echo prompts the firmware prefixes onto output, e.g. "> " or "# ".
const RE_PROMPT_NOISE = /^(?:[>#]\s*)+/

/* -------------------------------------------------------------------------- */
/*  Helpers                                                                   */
/* -------------------------------------------------------------------------- */

export function canonicalMac(mac: string): string {
    return mac.trim().toUpperCase()
}

export function isBlankLine(line: string): boolean {
    return line.trim().length === 0
}

/** Removes trailing CR/LF and any leading prompt echo. */
export function stripPromptNoise(line: string): string {
    return line.replace(/[\r\n]+$/, '').replace(RE_PROMPT_NOISE, '')
}

function raw(text: string): MarauderEvent {
    return Object.freeze({ kind: 'raw-line', text })
}

/* -------------------------------------------------------------------------- */
/*  parseLine                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Turn one line of Marauder output into exactly one event.
 *
 * Never throws. Patterns are tried in a fixed order because some are
 * prefixes of others; anything unrecognised comes back as `raw-line`.
 * Field orders the firmware has not been seen to print are not guessed at.
 */
export function parseLine(line: string): MarauderEvent {
    if (IGNORED.some(re => re.test(line))) {
        return raw(line)
    }

    let m = RE_AP_SSID_FIRST.exec(line)
    if (m) {
        return Object.freeze({
            kind: 'ap-found',
            rssi: Number.parseInt(m[1], 10),
            ssid: m[2],
            channel: Number.parseInt(m[3], 10),
            bssid: canonicalMac(m[4]),
        })
    }

    m = RE_AP_BSSID_FIRST.exec(line)
    if (m) {
        return Object.freeze({
            kind: 'ap-found',
            rssi: Number.parseInt(m[1], 10),
            channel: Number.parseInt(m[2], 10),
            bssid: canonicalMac(m[3]),
            ssid: m[4],
        })
    }

    m = RE_STATION.exec(line)
    if (m) {
        return Object.freeze({
            kind: 'station-found',
            rssi: Number.parseInt(m[1], 10),
            mac: canonicalMac(m[2]),
            associatedBssid: canonicalMac(m[3]),
        })
    }

    m = RE_BLE_NAMED.exec(line)
    if (m) {
        const vendor = m[2].trim()
        const model = m[3].trim()
        return Object.freeze({
            kind: 'ble-device-found',
            rssi: Number.parseInt(m[1], 10),
            name: model ? `[${vendor}] ${model}` : `[${vendor}]`,
            mac: '',
        })
    }

    m = RE_BLE_MAC.exec(line)
    if (m) {
        return Object.freeze({
            kind: 'ble-device-found',
            rssi: Number.parseInt(m[1], 10),
            name: '',
            mac: canonicalMac(m[2]),
        })
    }

    for (const [re, scanType] of SCAN_STARTED) {
        if (re.test(line)) return Object.freeze({ kind: 'scan-started', scanType })
    }

    if (RE_SCAN_STOPPED.test(line)) {
        return Object.freeze({ kind: 'scan-stopped' })
    }

    return raw(line)
}
