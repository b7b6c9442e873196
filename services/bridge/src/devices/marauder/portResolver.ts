// services/bridge/src/devices/marauder/portResolver.ts

import { SerialPort } from 'serialport'
import { PortNotFoundError } from '../../core/errors.js'
import type { PortLister } from './types.js'

interface CandidatePattern {
    /** Shown to the user when nothing matches. */
    label: string
    regex: RegExp
}

const PATTERNS: Partial<Record<NodeJS.Platform, CandidatePattern[]>> = {
    darwin: [
        { label: '/dev/cu.usbserial-*', regex: /^\/dev\/cu\.usbserial-/ },
        { label: '/dev/cu.SLAB_USBtoUART*', regex: /^\/dev\/cu\.SLAB_USBtoUART/ },
        { label: '/dev/cu.usbmodem*', regex: /^\/dev\/cu\.usbmodem/ },
    ],
    linux: [
        { label: '/dev/ttyUSB*', regex: /^\/dev\/ttyUSB\d+$/ },
        { label: '/dev/ttyACM*', regex: /^\/dev\/ttyACM\d+$/ },
    ],
    win32: [
        { label: 'COM*', regex: /^COM\d+$/i },
    ],
}

export function candidatePatterns(platform: NodeJS.Platform = process.platform): CandidatePattern[] {
    return PATTERNS[platform] ?? PATTERNS.linux ?? []
}

export interface ResolvePortOptions {
    platform?: NodeJS.Platform
    listPorts?: PortLister
}

const defaultLister: PortLister = () => SerialPort.list()

/**
 * Pick the device path to open.
 *
 * An explicit port is returned as-is; opening it is the caller's problem.
 * Otherwise the first lexically sorted path matching the platform patterns wins.
 */
export async function resolvePort(
    explicitPort?: string | null,
    opts: ResolvePortOptions = {}
): Promise<string> {
    const explicit = explicitPort?.trim()
    if (explicit) return explicit

    const patterns = candidatePatterns(opts.platform)
    const ports = await (opts.listPorts ?? defaultLister)()

    const matches = ports
        .map(p => p.path)
        .filter(path => patterns.some(p => p.regex.test(path)))
        .sort()

    const first = matches[0]
    if (first === undefined) {
        throw new PortNotFoundError(patterns.map(p => p.label))
    }
    return first
}
