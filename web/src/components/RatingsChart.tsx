import { RATING_MAX, RATING_MIN } from '../../../shared/dailyLog'
import type { RatingPoint } from '../utils/logReport'
import { shortDayLabel } from './LineChart'

type RatingKey = 'satisfaction' | 'neuralgia'

const SERIES_COLORS: Record<RatingKey, string> = {
  satisfaction: '#5ebf9e',
  neuralgia: '#d9756d',
}

const SERIES_LABELS: Record<RatingKey, string> = {
  satisfaction: 'Satisfaction',
  neuralgia: 'Neuralgia / pain',
}

interface RatingsChartProps {
  points: RatingPoint[]
  height?: number
}

export default function RatingsChart({ points, height = 200 }: RatingsChartProps) {
  if (points.length === 0) return null

  const padding = { top: 16, right: 12, bottom: 32, left: 40 }
  const width = 520
  const chartWidth = width - padding.left - padding.right
  const chartHeight = height - padding.top - padding.bottom
  const stepX = points.length > 1 ? chartWidth / (points.length - 1) : 0
  const span = RATING_MAX - RATING_MIN

  const yFor = (v: number) => {
    const clamped = Math.min(RATING_MAX, Math.max(RATING_MIN, v))
    return padding.top + chartHeight - ((clamped - RATING_MIN) / span) * chartHeight
  }

  const keys: RatingKey[] = ['satisfaction', 'neuralgia']
  const paths = keys.map((key) => ({
    key,
    color: SERIES_COLORS[key],
    d: points.map((p, i) => `${i === 0 ? 'M' : 'L'} ${padding.left + i * stepX} ${yFor(p[key])}`).join(' '),
  }))
  const labelEvery = Math.max(1, Math.ceil(points.length / 8))

  return (
    <div style={{ width: '100%', overflowX: 'auto' }}>
      <svg
        width="100%"
        viewBox={`0 0 ${width} ${height}`}
        preserveAspectRatio="xMidYMid meet"
        style={{ maxWidth: '100%', minWidth: 320 }}
        role="img"
        aria-label="Satisfaction and neuralgia ratings by day, scale 1 to 5"
      >
        {[1, 2, 3, 4, 5].map((v) => (
          <g key={v}>
            <line
              x1={padding.left}
              y1={yFor(v)}
              x2={padding.left + chartWidth}
              y2={yFor(v)}
              stroke="var(--border)"
              strokeWidth="1"
              strokeDasharray="4 4"
              opacity={0.5}
            />
            <text x={padding.left - 10} y={yFor(v) + 4} textAnchor="end" fontSize="10" fill="var(--text-muted)">
              {v}
            </text>
          </g>
        ))}
        {paths.map(({ key, d, color }) => (
          <path
            key={key}
            d={d}
            fill="none"
            stroke={color}
            strokeWidth="2.5"
            strokeLinecap="round"
            strokeLinejoin="round"
          />
        ))}
        {points.map((p, i) =>
          i % labelEvery === 0 ? (
            <text
              key={`${p.date}-${i}`}
              x={padding.left + i * stepX}
              y={height - 8}
              textAnchor="middle"
              fontSize="10"
              fill="var(--text-muted)"
            >
              {shortDayLabel(p.date)}
            </text>
          ) : null
        )}
      </svg>
      <div style={legendStyle}>
        {keys.map((key) => (
          <span key={key} style={{ ...legendItemStyle, color: SERIES_COLORS[key] }}>
            ● {SERIES_LABELS[key]}
          </span>
        ))}
      </div>
    </div>
  )
}

const legendStyle: React.CSSProperties = {
  display: 'flex',
  flexWrap: 'wrap',
  gap: '0.75rem 1.25rem',
  marginTop: '0.5rem',
  paddingLeft: 4,
}

const legendItemStyle: React.CSSProperties = {
  fontSize: '0.75rem',
  fontWeight: 500,
}
