// @vitest-environment jsdom
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { act } from 'react'
import { createRoot, type Root } from 'react-dom/client'
import BarChart from '../components/BarChart'
import EntriesTable from '../components/EntriesTable'
import { LOG_HEADERS, type CellValue } from '../../../shared/dailyLog'
import { parseLogRows } from '../utils/logReport'

let container: HTMLDivElement
let root: Root

beforeEach(() => {
  container = document.createElement('div')
  document.body.appendChild(container)
  root = createRoot(container)
})

afterEach(() => {
  act(() => root.unmount())
  container.remove()
})

describe('BarChart', () => {
  it('draws one labelled bar per category', () => {
    act(() => {
      root.render(
        <BarChart
          data={[
            { label: 'Run', value: 45 },
            { label: 'Swim', value: 20 },
          ]}
          valueLabel="minutes"
        />
      )
    })
    const svg = container.querySelector('svg')
    expect(svg?.getAttribute('aria-label')).toBe('Bar chart: minutes by category')
    const bars = [...container.querySelectorAll('rect')].map((r) => r.getAttribute('aria-label'))
    expect(bars).toEqual(['Run: 45 minutes', 'Swim: 20 minutes'])
  })

  it('renders nothing without data', () => {
    act(() => {
      root.render(<BarChart data={[]} valueLabel="minutes" />)
    })
    expect(container.innerHTML).toBe('')
  })
})

describe('EntriesTable', () => {
  it('shows only the columns that hold data', () => {
    const header: CellValue[] = [...LOG_HEADERS]
    const row: CellValue[] = LOG_HEADERS.map(() => '')
    row[0] = '2024-03-01'
    row[1] = 4
    row[2] = 2
    row[39] = 'slept well'
    const records = parseLogRows([header, row])

    act(() => {
      root.render(<EntriesTable header={header} records={records} caption="Recent entries" />)
    })
    const headings = [...container.querySelectorAll('th')].map((th) => th.textContent)
    expect(headings).toEqual(['Date', 'Satisfaction', 'Neuralgia', 'Insights'])
    const cells = [...container.querySelectorAll('td')].map((td) => td.textContent)
    expect(cells).toEqual(['2024-03-01', '4', '2', 'slept well'])
    expect(container.querySelector('caption')?.textContent).toBe('Recent entries')
  })
})
