import type { CellValue } from '../../../shared/dailyLog'
import { visibleColumns, type LogRecord } from '../utils/logReport'

interface EntriesTableProps {
  header: CellValue[]
  records: LogRecord[]
  caption: string
}

export default function EntriesTable({ header, records, caption }: EntriesTableProps) {
  if (records.length === 0) return null
  const columns = visibleColumns(header, records)

  return (
    <div style={styles.wrap}>
      <table style={styles.table}>
        <caption style={styles.caption}>{caption}</caption>
        <thead>
          <tr>
            {columns.map((i) => (
              <th key={i} style={styles.th} scope="col">
                {String(header[i])}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {records.map((r, rowIndex) => (
            <tr key={`${r.timestamp}-${rowIndex}`}>
              {columns.map((i) => (
                <td key={i} style={typeof r.row[i] === 'number' ? styles.tdNumber : styles.td}>
                  {String(r.row[i] ?? '')}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}

const styles: Record<string, React.CSSProperties> = {
  wrap: { width: '100%', overflowX: 'auto' },
  table: { borderCollapse: 'collapse', width: '100%', fontSize: '0.8125rem' },
  caption: { textAlign: 'left', fontWeight: 600, color: 'var(--text-muted)', padding: '0 0 0.5rem' },
  th: {
    textAlign: 'left',
    padding: '6px 8px',
    borderBottom: '1px solid var(--border)',
    color: 'var(--text-muted)',
    fontSize: '0.7rem',
    textTransform: 'uppercase',
    letterSpacing: '0.04em',
    whiteSpace: 'nowrap',
  },
  td: { padding: '6px 8px', borderBottom: '1px solid var(--border)', verticalAlign: 'top' },
  tdNumber: {
    padding: '6px 8px',
    borderBottom: '1px solid var(--border)',
    textAlign: 'right',
    fontFamily: 'var(--font-mono)',
  },
}
