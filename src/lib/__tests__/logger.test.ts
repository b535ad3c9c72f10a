import tty from 'tty'
import { describe, it, expect, vi } from 'vitest'
import { shouldColorize } from '../logger'

describe('shouldColorize', () => {
    it('should colour a terminal', () => {
        const isatty = vi.spyOn(tty, 'isatty').mockReturnValue(true)

        expect(shouldColorize('stdout')).toBe(true)
        expect(shouldColorize('stderr')).toBe(true)
        expect(isatty.mock.calls).toEqual([[1], [2]])
    })

    it('should not colour a pipe', () => {
        vi.spyOn(tty, 'isatty').mockReturnValue(false)

        expect(shouldColorize('stdout')).toBe(false)
    })

    it('should never colour a log file', () => {
        const isatty = vi.spyOn(tty, 'isatty').mockReturnValue(true)

        expect(shouldColorize('file')).toBe(false)
        expect(isatty).not.toHaveBeenCalled()
    })
})
