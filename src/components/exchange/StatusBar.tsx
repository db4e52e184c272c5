import dayjs from 'dayjs'
import { ExclamationTriangleIcon } from '@heroicons/react/24/outline'

interface StatusBarProps {
  lastUpdate: string | null
}

export function StatusBar({ lastUpdate }: StatusBarProps) {
  const formattedDate = lastUpdate && dayjs(lastUpdate).isValid() ? dayjs(lastUpdate).format('YYYY.MM.DD') : null

  return (
    <div role="status" className="shrink-0 bg-warning px-4 py-2">
      <div className="flex items-center gap-2">
        <ExclamationTriangleIcon className="h-4 w-4 text-white" />
        <span className="text-xs font-semibold uppercase tracking-wider text-white">Offline mode</span>
      </div>
      {formattedDate && (
        <p className="mt-0.5 text-xs uppercase tracking-wider text-amber-100">
          Last update: {formattedDate}
        </p>
      )}
    </div>
  )
}
