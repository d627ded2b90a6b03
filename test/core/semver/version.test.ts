import { describe, it, expect } from 'vitest'
import { SemVer } from '../../../core/semver'
import { v } from '../../helpers'

describe('SemVer', () => {
  describe('construction', () => {
    it('should build a version from its fields', () => {
      const version = new SemVer(1, 0, 0, 'rc.1', 'build.5')
      expect(version.major).toBe(1n)
      expect(version.minor).toBe(0n)
      expect(version.patch).toBe(0n)
      expect(version.preRelease).toBe('rc.1')
      expect(version.buildMeta).toBe('build.5')
      expect(version.prerelease).toEqual(['rc', 1n])
      expect(version.build).toEqual(['build', '5'])
    })

    it('should accept bigint fields', () => {
      const version = new SemVer(99999999999999999999999n, 0n, 1n)
      expect(version.toString()).toBe('99999999999999999999999.0.1')
    })

    it('should leave optional parts undefined', () => {
      const version = new SemVer(1, 2, 3)
      expect(version.preRelease).toBeUndefined()
      expect(version.buildMeta).toBeUndefined()
      expect(version.prerelease).toEqual([])
      expect(version.build).toEqual([])
    })

    it('should not validate its components', () => {
      const version = new SemVer(1, 2, 3, 'not valid!', 'also..not')
      expect(version.toString()).toBe('1.2.3-not valid!+also..not')
    })
  })

  describe('immutability', () => {
    it('should freeze the instance', () => {
      const version = v('1.0.0-alpha.1+build')
      expect(Object.isFrozen(version)).toBe(true)
      expect(Reflect.set(version, 'major', 2n)).toBe(false)
      expect(version.major).toBe(1n)
    })

    it('should let a subclass initialise its own fields', () => {
      class ChannelVersion extends SemVer {
        readonly channel: string

        constructor(channel: string) {
          super(1, 0, 0)
          this.channel = channel
          Object.freeze(this)
        }
      }

      const version = new ChannelVersion('stable')
      expect(version.channel).toBe('stable')
      expect(version.toString()).toBe('1.0.0')
      expect(Object.isFrozen(version)).toBe(true)
    })

    it('should freeze the identifier lists', () => {
      const version = v('1.0.0-alpha.1+build')
      expect(Object.isFrozen(version.prerelease)).toBe(true)
      expect(Object.isFrozen(version.build)).toBe(true)
    })
  })

  describe('equals', () => {
    it('should compare all five fields', () => {
      expect(v('1.0.0-rc.1+build.1').equals(new SemVer(1n, 0n, 0n, 'rc.1', 'build.1'))).toBe(true)
      expect(v('1.0.0-rc.1+build.1').equals(v('1.0.0-rc.1+build.2'))).toBe(false)
      expect(v('1.0.0-rc.1').equals(v('1.0.0-rc.2'))).toBe(false)
      expect(v('1.0.0').equals(v('1.0.1'))).toBe(false)
    })

    it('should treat a missing part as different from any present one', () => {
      expect(v('1.0.0').equals(v('1.0.0+meta'))).toBe(false)
      expect(v('1.0.0').equals(v('1.0.0-0'))).toBe(false)
    })
  })

  describe('toJSON', () => {
    it('should serialize as the version string', () => {
      expect(JSON.stringify({ version: v('2.0.0-rc.1+build.123') })).toBe(
        '{"version":"2.0.0-rc.1+build.123"}'
      )
    })
  })
})
