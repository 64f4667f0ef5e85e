import { useMemo, useState } from 'react'
import { useLog } from '../context/LogContext'
import BarChart from '../components/BarChart'
import LineChart from '../components/LineChart'
import RatingsChart from '../components/RatingsChart'
import MonthPickerStrip from '../components/MonthPickerStrip'
import EntriesTable from '../components/EntriesTable'
import {
  availableMonths,
  dailyTotals,
  defaultMonth,
  filterByMonth,
  parseLogRows,
  ratingSeries,
  totalsByCategory,
  unpivotActivities,
  unpivotExercises,
} from '../utils/logReport'

const RECENT_ENTRY_COUNT = 10

export default function ReportPage() {
  const log = useLog()
  const rows = log.rows
  const header = rows?.[0] ?? []

  const records = useMemo(() => (rows ? parseLogRows(rows) : []), [rows])
  const months = useMemo(() => availableMonths(records), [records])

  // null follows the default month until the user picks one
  const [pickedMonth, setPickedMonth] = useState<string | null>(null)
  const month = pickedMonth && months.includes(pickedMonth) ? pickedMonth : defaultMonth(months)
  const [selectedDate, setSelectedDate] = useState<string | null>(null)

  const monthRecords = useMemo(() => filterByMonth(records, month), [records, month])
  const exercisePoints = useMemo(() => unpivotExercises(monthRecords), [monthRecords])
  const activityPoints = useMemo(() => unpivotActivities(monthRecords), [monthRecords])
  const exerciseByType = useMemo(() => totalsByCategory(exercisePoints), [exercisePoints])
  const exerciseByDay = useMemo(() => dailyTotals(exercisePoints), [exercisePoints])
  const activityByType = useMemo(() => totalsByCategory(activityPoints), [activityPoints])
  const ratings = useMemo(() => ratingSeries(monthRecords), [monthRecords])
  const notes = activityPoints.filter((a) => a.notes.trim() !== '')
  const recent = records.slice(-RECENT_ENTRY_COUNT)

  const dayExercises = selectedDate ? exercisePoints.filter((p) => p.date === selectedDate) : []
  const dayActivities = selectedDate ? activityPoints.filter((p) => p.date === selectedDate) : []

  const selectMonth = (m: string) => {
    setPickedMonth(m)
    setSelectedDate(null)
  }

  if (rows === null) {
    return (
      <div style={styles.page}>
        <h1 style={styles.title}>Monthly report</h1>
        {log.entriesError ? (
          <p style={styles.errorMsg} role="alert">
            {log.entriesError}
          </p>
        ) : (
          <p style={styles.muted}>Loading entries...</p>
        )}
      </div>
    )
  }

  if (rows.length === 0) {
    return (
      <div style={styles.page}>
        <h1 style={styles.title}>Monthly report</h1>
        <p style={styles.muted}>No data found yet. Save your first entry to see the log.</p>
      </div>
    )
  }

  if (records.length === 0) {
    return (
      <div style={styles.page}>
        <h1 style={styles.title}>Monthly report</h1>
        <p style={styles.muted}>The sheet is currently empty.</p>
      </div>
    )
  }

  return (
    <div style={styles.page}>
      <div style={styles.titleRow}>
        <div>
          <h1 style={styles.title}>Monthly report</h1>
          <p style={styles.subtitle}>
            {monthRecords.length} {monthRecords.length === 1 ? 'entry' : 'entries'} in {month}
          </p>
        </div>
        <button type="button" onClick={log.refreshEntries} disabled={log.loadingEntries} style={styles.secondaryBtn}>
          {log.loadingEntries ? 'Refreshing...' : 'Refresh'}
        </button>
      </div>
      {log.entriesError && (
        <p style={styles.errorMsg} role="alert">
          {log.entriesError}
        </p>
      )}

      <MonthPickerStrip months={months} selectedMonth={month} onSelectMonth={selectMonth} />

      {monthRecords.length === 0 ? (
        <p style={styles.muted}>No entries for {month}.</p>
      ) : (
        <>
          <section style={styles.section}>
            <h2 style={styles.sectionTitle}>Exercise minutes by type</h2>
            {exerciseByType.length > 0 ? (
              <BarChart data={exerciseByType} valueLabel="minutes" />
            ) : (
              <p style={styles.muted}>No exercise logged this month.</p>
            )}
          </section>

          {exerciseByDay.length > 0 && (
            <section style={styles.section}>
              <h2 style={styles.sectionTitle}>Exercise minutes per day</h2>
              <p style={styles.hint}>Click a point to see that day.</p>
              <LineChart
                data={exerciseByDay}
                valueLabel="minutes"
                selectedDate={selectedDate}
                onSelectDate={setSelectedDate}
              />
              {selectedDate && (
                <div style={styles.dayDetail}>
                  <h3 style={styles.dayTitle}>{selectedDate}</h3>
                  <ul style={styles.list}>
                    {dayExercises.map((p, i) => (
                      <li key={`ex-${i}`}>
                        {p.category}: {p.minutes} min{p.miles > 0 ? `, ${p.miles} mi` : ''}
                      </li>
                    ))}
                    {dayActivities.map((p, i) => (
                      <li key={`act-${i}`}>
                        {p.category}: {p.minutes} min{p.notes ? ` (${p.notes})` : ''}
                      </li>
                    ))}
                  </ul>
                </div>
              )}
            </section>
          )}

          <section style={styles.section}>
            <h2 style={styles.sectionTitle}>Satisfaction &amp; neuralgia</h2>
            <RatingsChart points={ratings} />
          </section>

          <section style={styles.section}>
            <h2 style={styles.sectionTitle}>Daily activity minutes by type</h2>
            {activityByType.length > 0 ? (
              <BarChart data={activityByType} valueLabel="minutes" />
            ) : (
              <p style={styles.muted}>No activities logged this month.</p>
            )}
            {notes.length > 0 && (
              <ul style={styles.list} aria-label="Activity notes">
                {notes.map((n, i) => (
                  <li key={i}>
                    <span style={styles.noteDate}>{n.date}</span> {n.category}: {n.notes}
                  </li>
                ))}
              </ul>
            )}
          </section>

          <section style={styles.section}>
            <EntriesTable header={header} records={monthRecords} caption={`All entries for ${month}`} />
          </section>
        </>
      )}

      <section style={styles.section}>
        <EntriesTable header={header} records={recent} caption="Recent entries" />
      </section>
    </div>
  )
}

const styles: Record<string, React.CSSProperties> = {
  page: { display: 'flex', flexDirection: 'column', gap: '1.5rem' },
  titleRow: { display: 'flex', justifyContent: 'space-between', alignItems: 'flex-start', gap: '1rem' },
  title: { margin: 0, fontSize: '1.75rem', fontWeight: 700 },
  subtitle: { margin: '0.25rem 0 0', color: 'var(--text-muted)', fontSize: '1rem' },
  section: {
    background: 'var(--surface)',
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    padding: '1.5rem',
  },
  sectionTitle: { margin: '0 0 1rem', fontSize: '1.125rem', fontWeight: 600 },
  hint: { margin: '-0.5rem 0 0.75rem', fontSize: '0.8125rem', color: 'var(--text-muted)' },
  muted: { margin: 0, color: 'var(--text-muted)' },
  dayDetail: {
    marginTop: '1rem',
    padding: '0.75rem 1rem',
    background: 'var(--surface-elevated)',
    borderRadius: 'var(--radius)',
  },
  dayTitle: { margin: '0 0 0.5rem', fontSize: '0.9375rem', fontFamily: 'var(--font-mono)' },
  list: { margin: '0.75rem 0 0', paddingLeft: '1.25rem', fontSize: '0.875rem' },
  noteDate: { fontFamily: 'var(--font-mono)', color: 'var(--text-muted)' },
  secondaryBtn: {
    padding: '0.5rem 1rem',
    background: 'var(--surface-elevated)',
    color: 'var(--text)',
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    fontWeight: 500,
    fontSize: '0.875rem',
    cursor: 'pointer',
  },
  errorMsg: { margin: 0, color: 'var(--danger)', fontSize: '0.875rem', fontWeight: 600 },
}
