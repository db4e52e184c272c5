/**
 * Swipe-to-reveal gesture tracking
 *
 * A row slides left under the pointer to uncover an action of fixed width.
 * On release it snaps fully open past the threshold, otherwise closes.
 */

export interface SwipeConfig {
  /** Width of the revealed action, in px */
  revealWidth: number
  /** Release past this distance snaps open */
  snapThreshold: number
  /** Movement beyond this counts as a drag rather than a tap */
  moveTolerance: number
}

export const DEFAULT_SWIPE_CONFIG: SwipeConfig = {
  revealWidth: 80,
  snapThreshold: 40,
  moveTolerance: 5,
}

export interface SwipeState {
  /** Current translateX, between -revealWidth and 0 */
  offset: number
  /** Offset when the pointer went down */
  originOffset: number
  startX: number
  isDragging: boolean
  didMove: boolean
}

export type SwipeAction =
  | { type: 'start'; x: number }
  | { type: 'move'; x: number }
  | { type: 'end' }
  | { type: 'close' }

export const INITIAL_SWIPE_STATE: SwipeState = {
  offset: 0,
  originOffset: 0,
  startX: 0,
  isDragging: false,
  didMove: false,
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

export function swipeReducer(
  state: SwipeState,
  action: SwipeAction,
  config: SwipeConfig = DEFAULT_SWIPE_CONFIG
): SwipeState {
  switch (action.type) {
    case 'start':
      return {
        ...state,
        startX: action.x,
        originOffset: state.offset,
        isDragging: true,
        didMove: false,
      }

    case 'move': {
      if (!state.isDragging) return state
      const delta = action.x - state.startX
      return {
        ...state,
        offset: clamp(state.originOffset + delta, -config.revealWidth, 0),
        didMove: state.didMove || Math.abs(delta) > config.moveTolerance,
      }
    }

    case 'end':
      if (!state.isDragging) return state
      return {
        ...state,
        offset: state.offset < -config.snapThreshold ? -config.revealWidth : 0,
        isDragging: false,
      }

    case 'close':
      return { ...state, offset: 0, isDragging: false }
  }
}

/**
 * Decide what a click after a gesture means: a tap only if the pointer
 * didn't drag and the row wasn't open. A click on an open row closes it.
 */
export function resolveTap(state: SwipeState): { isTap: boolean; shouldClose: boolean } {
  if (state.didMove) return { isTap: false, shouldClose: false }
  if (state.offset !== 0) return { isTap: false, shouldClose: true }
  return { isTap: true, shouldClose: false }
}
