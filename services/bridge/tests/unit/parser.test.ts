import { describe, it, expect } from 'vitest'
import {
    canonicalMac,
    isBlankLine,
    parseLine,
    stripPromptNoise,
} from '../../src/devices/marauder/parser.js'
import type { ScanType } from '../../src/devices/marauder/types.js'

describe('parseLine', () => {
    describe('access points', () => {
        it('parses the ESSID-first layout and uppercases the BSSID', () => {
            expect(parseLine('-42 ESSID: MyNetwork Ch: 6 BSSID: aa:bb:cc:dd:ee:ff')).toEqual({
                kind: 'ap-found',
                rssi: -42,
                ssid: 'MyNetwork',
                channel: 6,
                bssid: 'AA:BB:CC:DD:EE:FF',
            })
        })

        it('parses the BSSID-first layout', () => {
            expect(parseLine('-60 Ch: 11 BSSID: 11:22:33:44:55:66 ESSID: Cafe Guest')).toEqual({
                kind: 'ap-found',
                rssi: -60,
                channel: 11,
                bssid: '11:22:33:44:55:66',
                ssid: 'Cafe Guest',
            })
        })

        it('keeps spaces inside the SSID', () => {
            const evt = parseLine('-50 ESSID: My Home Net Ch: 1 BSSID: 0A:0B:0C:0D:0E:0F')
            expect(evt).toMatchObject({ kind: 'ap-found', ssid: 'My Home Net', channel: 1 })
        })

        it('tolerates indentation before the RSSI', () => {
            expect(parseLine('  -42 Ch: 6 BSSID: aa:bb:cc:dd:ee:ff ESSID: TestNet')).toEqual({
                kind: 'ap-found',
                ssid: 'TestNet',
                bssid: 'AA:BB:CC:DD:EE:FF',
                channel: 6,
                rssi: -42,
            })
        })

        it('falls back to raw-line when the channel is not numeric', () => {
            const line = '-42 ESSID: X Ch: ab BSSID: AA:BB:CC:DD:EE:FF'
            expect(parseLine(line)).toEqual({ kind: 'raw-line', text: line })
        })
    })

    it('parses station lines with both addresses uppercased', () => {
        expect(parseLine('-55 Station: aa:bb:cc:dd:ee:01 Associated: 11:22:33:44:55:6a')).toEqual({
            kind: 'station-found',
            rssi: -55,
            mac: 'AA:BB:CC:DD:EE:01',
            associatedBssid: '11:22:33:44:55:6A',
        })
    })

    it('parses an indented station line', () => {
        expect(parseLine('\t-55 Station: 01:02:03:04:05:06 Associated: aa:bb:cc:dd:ee:ff')).toEqual({
            kind: 'station-found',
            rssi: -55,
            mac: '01:02:03:04:05:06',
            associatedBssid: 'AA:BB:CC:DD:EE:FF',
        })
    })

    describe('BLE devices', () => {
        it('builds a "[vendor] model" name with an empty mac', () => {
            expect(parseLine('-80 Device: [LG] webOS TV UP7550PSF')).toEqual({
                kind: 'ble-device-found',
                rssi: -80,
                name: '[LG] webOS TV UP7550PSF',
                mac: '',
            })
        })

        it('uses just the vendor tag when no model follows', () => {
            expect(parseLine('-71 Device: [Apple]')).toMatchObject({ name: '[Apple]', mac: '' })
        })

        it('parses address-only devices', () => {
            expect(parseLine('-73 Device: 63:c6:bb:7b:d1:1c')).toEqual({
                kind: 'ble-device-found',
                rssi: -73,
                name: '',
                mac: '63:C6:BB:7B:D1:1C',
            })
        })
    })

    describe('scan lifecycle', () => {
        it.each<[string, ScanType]>([
            ['Starting WiFi scan', 'wifi'],
            ['Starting Bluetooth scan', 'bluetooth'],
            ['Started AP scan', 'ap'],
            ['starting station scan', 'station'],
        ])('%s -> %s', (line, scanType) => {
            expect(parseLine(line)).toEqual({ kind: 'scan-started', scanType })
        })

        it.each(['Shutting down BLE', 'Stopping WiFi tran/recv', 'stopscan'])('%s stops the scan', (line) => {
            expect(parseLine(line)).toEqual({ kind: 'scan-stopped' })
        })
    })

    it('treats beacon detail output as raw even when it embeds an AP line', () => {
        const line = 'Beacon Frame: -42 ESSID: X Ch: 1 BSSID: AA:BB:CC:DD:EE:FF'
        expect(parseLine(line)).toEqual({ kind: 'raw-line', text: line })
    })

    it('returns anything unrecognised as raw-line', () => {
        expect(parseLine('Marauder v0.13.10')).toEqual({ kind: 'raw-line', text: 'Marauder v0.13.10' })
    })

    it('returns frozen events', () => {
        expect(Object.isFrozen(parseLine('-73 Device: 63:C6:BB:7B:D1:1C'))).toBe(true)
        expect(Object.isFrozen(parseLine('hello'))).toBe(true)
    })
})

describe('line helpers', () => {
    it('strips line endings and prompt echo', () => {
        expect(stripPromptNoise('> # scanap\r\n')).toBe('scanap')
        expect(stripPromptNoise('#stopscan\r')).toBe('stopscan')
        expect(stripPromptNoise('-42 ESSID: A Ch: 1 BSSID: AA:BB:CC:DD:EE:FF\r')).toBe(
            '-42 ESSID: A Ch: 1 BSSID: AA:BB:CC:DD:EE:FF'
        )
    })

    it('detects whitespace-only lines', () => {
        expect(isBlankLine('   \t')).toBe(true)
        expect(isBlankLine(' x ')).toBe(false)
    })

    it('canonicalises MAC addresses', () => {
        expect(canonicalMac(' aa:bb:cc:dd:ee:ff ')).toBe('AA:BB:CC:DD:EE:FF')
    })
})
