import type { ReactNode } from 'react'
import {
  Dialog as AriaDialog,
  Modal as AriaModal,
  ModalOverlay as AriaModalOverlay,
  Heading as AriaHeading,
} from 'react-aria-components'
import type {
  DialogProps as AriaDialogProps,
  ModalOverlayProps as AriaModalOverlayProps,
} from 'react-aria-components'
import { cx } from '@/utils/cx'

interface SheetOverlayProps extends Omit<AriaModalOverlayProps, 'children'> {
  children: ReactNode
}

/**
 * Dimmed overlay with the sheet docked to the bottom edge
 */
function SheetOverlay({ children, className, ...props }: SheetOverlayProps) {
  return (
    <AriaModalOverlay
      isDismissable
      {...props}
      className={(state) =>
        cx(
          'fixed inset-0 z-40 flex items-end justify-center bg-black/40',
          typeof className === 'function' ? className(state) : className
        )
      }
    >
      <AriaModal className="w-full max-w-sm">
        {children}
      </AriaModal>
    </AriaModalOverlay>
  )
}

interface SheetContentProps extends AriaDialogProps {
  children: ReactNode
}

function SheetContent({ children, className, ...props }: SheetContentProps) {
  return (
    <AriaDialog
      {...props}
      className={cx(
        'flex max-h-[80vh] flex-col rounded-t-3xl bg-surface shadow-2xl outline-none',
        className
      )}
    >
      {/* Drag handle */}
      <div className="flex shrink-0 justify-center pt-3 pb-1">
        <div className="h-1 w-10 rounded-full bg-slate-300" />
      </div>
      {children}
    </AriaDialog>
  )
}

interface SheetTitleProps {
  children: ReactNode
  className?: string
}

function SheetTitle({ children, className }: SheetTitleProps) {
  return (
    <AriaHeading slot="title" className={cx('text-base font-semibold text-text', className)}>
      {children}
    </AriaHeading>
  )
}

export const Sheet = {
  Overlay: SheetOverlay,
  Content: SheetContent,
  Title: SheetTitle,
}
