interface MonthPickerStripProps {
  months: string[]
  selectedMonth: string
  onSelectMonth: (month: string) => void
}

export default function MonthPickerStrip({ months, selectedMonth, onSelectMonth }: MonthPickerStripProps) {
  const currentMonth = new Date().toLocaleDateString('en-US', { month: 'long' })

  return (
    <div style={styles.wrapper}>
      <span style={styles.label}>Month</span>
      <div style={styles.strip} role="tablist" aria-label="Select a month to view">
        {months.map((month) => {
          const isSelected = month === selectedMonth
          const isCurrent = month === currentMonth
          return (
            <button
              key={month}
              type="button"
              role="tab"
              aria-selected={isSelected}
              style={{
                ...styles.monthButton,
                ...(isSelected ? styles.monthButtonSelected : {}),
                ...(isCurrent && !isSelected ? styles.monthButtonCurrent : {}),
              }}
              onClick={() => onSelectMonth(month)}
            >
              <span style={styles.monthShort}>{month.slice(0, 3)}</span>
              {isCurrent && <span style={styles.currentBadge}>Now</span>}
            </button>
          )
        })}
      </div>
    </div>
  )
}

const styles: Record<string, React.CSSProperties> = {
  wrapper: {
    display: 'flex',
    flexDirection: 'column',
    gap: '0.5rem',
  },
  label: {
    fontSize: '0.75rem',
    fontWeight: 600,
    color: 'var(--text-muted)',
    textTransform: 'uppercase',
    letterSpacing: '0.04em',
  },
  strip: {
    display: 'flex',
    gap: '0.5rem',
    overflowX: 'auto',
    paddingBottom: '4px',
    scrollbarWidth: 'thin',
  },
  monthButton: {
    flexShrink: 0,
    minWidth: 56,
    padding: '0.5rem 0.6rem',
    background: 'var(--surface)',
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    color: 'var(--text)',
    display: 'flex',
    flexDirection: 'column',
    alignItems: 'center',
    gap: '2px',
    transition: 'border-color 0.15s, background 0.15s',
  },
  monthButtonSelected: {
    background: 'var(--accent)',
    borderColor: 'var(--accent)',
    color: 'var(--bg)',
  },
  monthButtonCurrent: {
    borderColor: 'var(--accent-dim)',
  },
  monthShort: {
    fontSize: '1rem',
    fontWeight: 700,
    fontFamily: 'var(--font-mono)',
  },
  currentBadge: {
    fontSize: '0.6rem',
    fontWeight: 600,
    textTransform: 'uppercase',
    letterSpacing: '0.03em',
    opacity: 0.9,
  },
}
