import { useCallback, useReducer, type PointerEvent } from 'react'
import {
  DEFAULT_SWIPE_CONFIG,
  INITIAL_SWIPE_STATE,
  resolveTap,
  swipeReducer,
  type SwipeAction,
  type SwipeConfig,
  type SwipeState,
} from '@/lib/gestures/swipe'

export function useSwipeToReveal(config: SwipeConfig = DEFAULT_SWIPE_CONFIG) {
  const [state, dispatch] = useReducer(
    (current: SwipeState, action: SwipeAction) => swipeReducer(current, action, config),
    INITIAL_SWIPE_STATE
  )

  const onPointerDown = useCallback((e: PointerEvent<HTMLElement>) => {
    dispatch({ type: 'start', x: e.clientX })
    e.currentTarget.setPointerCapture?.(e.pointerId)
  }, [])

  const onPointerMove = useCallback((e: PointerEvent<HTMLElement>) => {
    dispatch({ type: 'move', x: e.clientX })
  }, [])

  const onPointerEnd = useCallback(() => dispatch({ type: 'end' }), [])

  const close = useCallback(() => dispatch({ type: 'close' }), [])

  /** Call from onClick; true when the click should act as a tap */
  const consumeTap = useCallback((): boolean => {
    const { isTap, shouldClose } = resolveTap(state)
    if (shouldClose) dispatch({ type: 'close' })
    return isTap
  }, [state])

  return {
    offset: state.offset,
    isDragging: state.isDragging,
    isOpen: state.offset !== 0,
    close,
    consumeTap,
    handlers: {
      onPointerDown,
      onPointerMove,
      onPointerUp: onPointerEnd,
      onPointerCancel: onPointerEnd,
    },
  }
}
