import { describe, it, expect } from 'vitest'
import { INITIAL_SWIPE_STATE, resolveTap, swipeReducer, type SwipeAction, type SwipeState } from './swipe'

function run(actions: SwipeAction[], from: SwipeState = INITIAL_SWIPE_STATE): SwipeState {
  return actions.reduce((state, action) => swipeReducer(state, action), from)
}

describe('swipeReducer', () => {
  it('follows the pointer to the left', () => {
    const state = run([
      { type: 'start', x: 200 },
      { type: 'move', x: 170 },
    ])

    expect(state.offset).toBe(-30)
    expect(state.isDragging).toBe(true)
    expect(state.didMove).toBe(true)
  })

  it('clamps between the reveal width and zero', () => {
    expect(run([{ type: 'start', x: 200 }, { type: 'move', x: 50 }]).offset).toBe(-80)
    expect(run([{ type: 'start', x: 200 }, { type: 'move', x: 260 }]).offset).toBe(0)
  })

  it('snaps open when released past the threshold', () => {
    const state = run([
      { type: 'start', x: 200 },
      { type: 'move', x: 150 },
      { type: 'end' },
    ])

    expect(state.offset).toBe(-80)
    expect(state.isDragging).toBe(false)
  })

  it('snaps closed when released short of the threshold', () => {
    const state = run([
      { type: 'start', x: 200 },
      { type: 'move', x: 170 },
      { type: 'end' },
    ])

    expect(state.offset).toBe(0)
  })

  it('drags an open row from where it rests', () => {
    const open = run([{ type: 'start', x: 200 }, { type: 'move', x: 100 }, { type: 'end' }])

    const state = run([{ type: 'start', x: 100 }, { type: 'move', x: 160 }, { type: 'end' }], open)

    expect(state.offset).toBe(0)
  })

  it('treats small movement as a tap', () => {
    const state = run([{ type: 'start', x: 200 }, { type: 'move', x: 197 }, { type: 'end' }])

    expect(state.didMove).toBe(false)
    expect(resolveTap(state)).toEqual({ isTap: true, shouldClose: false })
  })

  it('ignores moves without a pointer down', () => {
    expect(swipeReducer(INITIAL_SWIPE_STATE, { type: 'move', x: 10 })).toBe(INITIAL_SWIPE_STATE)
    expect(swipeReducer(INITIAL_SWIPE_STATE, { type: 'end' })).toBe(INITIAL_SWIPE_STATE)
  })

  it('closes an open row', () => {
    const open = run([{ type: 'start', x: 200 }, { type: 'move', x: 100 }, { type: 'end' }])

    expect(swipeReducer(open, { type: 'close' }).offset).toBe(0)
  })
})

describe('resolveTap', () => {
  it('is not a tap after a drag', () => {
    const state = run([{ type: 'start', x: 200 }, { type: 'move', x: 180 }, { type: 'end' }])

    expect(resolveTap(state)).toEqual({ isTap: false, shouldClose: false })
  })

  it('closes an open row instead of tapping', () => {
    const open = run([{ type: 'start', x: 200 }, { type: 'move', x: 100 }, { type: 'end' }])
    const pressed = run([{ type: 'start', x: 100 }, { type: 'end' }], open)

    expect(resolveTap(pressed)).toEqual({ isTap: false, shouldClose: true })
  })
})
