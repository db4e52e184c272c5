import { describe, it, expect } from 'vitest'
import { render, screen } from '@testing-library/react'
import { StatusBar } from './StatusBar'

describe('StatusBar', () => {
  it('shows the offline notice with the last update date', () => {
    render(<StatusBar lastUpdate="2026-10-17" />)

    expect(screen.getByRole('status')).toHaveTextContent('Offline mode')
    expect(screen.getByText('Last update: 2026.10.17')).toBeInTheDocument()
  })

  it('omits the date when none is known', () => {
    render(<StatusBar lastUpdate={null} />)

    expect(screen.getByText('Offline mode')).toBeInTheDocument()
    expect(screen.queryByText(/Last update/)).not.toBeInTheDocument()
  })
})
