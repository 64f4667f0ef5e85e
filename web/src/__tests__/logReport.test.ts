import { describe, it, expect } from 'vitest'
import { LOG_HEADERS, MAX_ACTIVITY_SLOTS, type CellValue } from '../../../shared/dailyLog'
import {
  availableMonths,
  dailyTotals,
  defaultMonth,
  filterByMonth,
  monthName,
  parseLogRows,
  ratingSeries,
  toNumber,
  totalsByCategory,
  unpivotActivities,
  unpivotExercises,
  visibleColumns,
} from '../utils/logReport'

interface RowInput {
  date: CellValue
  satisfaction?: number
  neuralgia?: number
  ex1?: [string, number, number]
  ex2?: [string, number, number]
  activities?: [string, number, string][]
  insights?: string
}

function logRow(input: RowInput): CellValue[] {
  const slots: CellValue[] = []
  for (let i = 0; i < MAX_ACTIVITY_SLOTS; i++) {
    slots.push(...(input.activities?.[i] ?? ['None', 0, '']))
  }
  return [
    input.date,
    input.satisfaction ?? 3,
    input.neuralgia ?? 1,
    ...(input.ex1 ?? ['None', 0, 0]),
    ...(input.ex2 ?? ['None', 0, 0]),
    ...slots,
    input.insights ?? '',
    '2024-03-01 20:00:00',
  ]
}

const header: CellValue[] = [...LOG_HEADERS]

describe('parseLogRows', () => {
  it('returns nothing for an empty sheet or a lone header', () => {
    expect(parseLogRows([])).toEqual([])
    expect(parseLogRows([header])).toEqual([])
  })

  it('reads a full row by header name', () => {
    const [record] = parseLogRows([
      header,
      logRow({
        date: '2024-03-01',
        satisfaction: 4,
        neuralgia: 2,
        ex1: ['Run', 30, 3.1],
        activities: [['Walk', 20, 'park loop']],
        insights: 'slept well',
      }),
    ])
    expect(record.date).toBe('2024-03-01')
    expect(record.satisfaction).toBe(4)
    expect(record.neuralgia).toBe(2)
    expect(record.exercises).toEqual([
      { type: 'Run', minutes: 30, miles: 3.1 },
      { type: 'None', minutes: 0, miles: 0 },
    ])
    expect(record.activities).toHaveLength(MAX_ACTIVITY_SLOTS)
    expect(record.activities[0]).toEqual({ type: 'Walk', minutes: 20, notes: 'park loop' })
    expect(record.insights).toBe('slept well')
    expect(record.timestamp).toBe('2024-03-01 20:00:00')
    expect(record.row).toHaveLength(LOG_HEADERS.length)
  })

  it('maps the older single-exercise headers onto the first exercise', () => {
    const [record] = parseLogRows([
      ['Date', 'Satisfaction', 'Neuralgia', 'Exercise_Type', 'Exercise_Mins', 'Insights'],
      ['2024-02-03', 4, 2, 'Swim', 40, 'ok'],
    ])
    expect(record.exercises).toEqual([
      { type: 'Swim', minutes: 40, miles: 0 },
      { type: '', minutes: 0, miles: 0 },
    ])
    expect(record.insights).toBe('ok')
    expect(record.activities.every((a) => a.type === '')).toBe(true)
  })

  it('turns day serials into ISO dates', () => {
    const [record] = parseLogRows([header, logRow({ date: 45352 })])
    expect(record.date).toBe('2024-03-01')
  })

  it('skips rows with no content', () => {
    const records = parseLogRows([header, ['', '', ''], logRow({ date: '2024-03-02' })])
    expect(records.map((r) => r.date)).toEqual(['2024-03-02'])
  })

  it('pads short rows to the header width', () => {
    const [record] = parseLogRows([['Date', 'Satisfaction', 'Insights'], ['2024-03-04', 5]])
    expect(record.row).toEqual(['2024-03-04', 5, ''])
    expect(record.insights).toBe('')
  })
})

describe('toNumber', () => {
  it('reads numeric text and treats anything else as 0', () => {
    expect(toNumber(12)).toBe(12)
    expect(toNumber('2.5')).toBe(2.5)
    expect(toNumber('')).toBe(0)
    expect(toNumber('lots')).toBe(0)
    expect(toNumber(undefined)).toBe(0)
  })
})

describe('month filter', () => {
  const records = parseLogRows([
    header,
    logRow({ date: '2024-05-02' }),
    logRow({ date: '2024-01-10' }),
    logRow({ date: '2023-05-30' }),
  ])

  it('names the month of an ISO date', () => {
    expect(monthName('2024-03-15')).toBe('March')
    expect(monthName('2024-12-01')).toBe('December')
    expect(monthName('not a date')).toBeNull()
  })

  it('lists present months in calendar order', () => {
    expect(availableMonths(records)).toEqual(['January', 'May'])
  })

  it('keeps every year of the chosen month', () => {
    expect(filterByMonth(records, 'May').map((r) => r.date)).toEqual(['2024-05-02', '2023-05-30'])
  })

  it('defaults to the current month when it has data', () => {
    expect(defaultMonth(['January', 'May'], new Date(2024, 4, 10))).toBe('May')
  })

  it('falls back to the latest month with data', () => {
    expect(defaultMonth(['January', 'May'], new Date(2024, 6, 1))).toBe('May')
    expect(defaultMonth([], new Date(2024, 6, 1))).toBe('July')
  })
})

describe('chart series', () => {
  const records = parseLogRows([
    header,
    logRow({
      date: '2024-03-02',
      satisfaction: 2,
      neuralgia: 4,
      ex1: ['Run', 15, 1.5],
      ex2: ['Yoga', 45, 0],
      activities: [
        ['Walk', 20, 'to the shop'],
        ['Reading', 30, ''],
      ],
    }),
    logRow({
      date: '2024-03-01',
      satisfaction: 4,
      neuralgia: 1,
      ex1: ['Run', 30, 3],
      ex2: ['Swim', 20, 0.5],
      activities: [['Walk', 10, '']],
    }),
  ])

  it('drops empty exercise slots when unpivoting', () => {
    expect(unpivotExercises(records)).toEqual([
      { date: '2024-03-02', category: 'Run', minutes: 15, miles: 1.5 },
      { date: '2024-03-02', category: 'Yoga', minutes: 45, miles: 0 },
      { date: '2024-03-01', category: 'Run', minutes: 30, miles: 3 },
      { date: '2024-03-01', category: 'Swim', minutes: 20, miles: 0.5 },
    ])
  })

  it('drops sentinel activity slots when unpivoting', () => {
    expect(unpivotActivities(records)).toEqual([
      { date: '2024-03-02', category: 'Walk', minutes: 20, notes: 'to the shop' },
      { date: '2024-03-02', category: 'Reading', minutes: 30, notes: '' },
      { date: '2024-03-01', category: 'Walk', minutes: 10, notes: '' },
    ])
  })

  it('totals minutes per type, largest first', () => {
    expect(totalsByCategory(unpivotExercises(records))).toEqual([
      { label: 'Run', value: 45 },
      { label: 'Yoga', value: 45 },
      { label: 'Swim', value: 20 },
    ])
  })

  it('totals minutes per day in date order', () => {
    expect(dailyTotals(unpivotExercises(records))).toEqual([
      { date: '2024-03-01', value: 50 },
      { date: '2024-03-02', value: 60 },
    ])
  })

  it('orders ratings by date', () => {
    expect(ratingSeries(records)).toEqual([
      { date: '2024-03-01', satisfaction: 4, neuralgia: 1 },
      { date: '2024-03-02', satisfaction: 2, neuralgia: 4 },
    ])
  })
})

describe('visibleColumns', () => {
  it('hides columns that only hold sentinels or blanks', () => {
    const records = parseLogRows([
      header,
      logRow({ date: '2024-03-01', satisfaction: 4, neuralgia: 2, ex1: ['Run', 30, 3.1], activities: [['Walk', 20, 'park']] }),
    ])
    expect(visibleColumns(header, records)).toEqual([0, 1, 2, 3, 4, 5, 9, 10, 11, 40])
  })
})
