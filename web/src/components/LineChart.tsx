import { useId } from 'react'
import type { DatedValue } from '../utils/logReport'

interface LineChartProps {
  data: DatedValue[]
  valueLabel: string
  selectedDate: string | null
  onSelectDate?: (date: string) => void
  height?: number
  accentColor?: string
}

export function shortDayLabel(date: string): string {
  const dt = new Date(date + 'T12:00:00')
  if (Number.isNaN(dt.getTime())) return date
  return dt.toLocaleDateString('en-US', { month: 'numeric', day: 'numeric' })
}

export default function LineChart({
  data,
  valueLabel,
  selectedDate,
  onSelectDate,
  height = 140,
  accentColor = 'var(--accent)',
}: LineChartProps) {
  const gradientId = useId().replace(/:/g, '-')
  if (data.length === 0) return null

  const max = Math.max(...data.map((d) => d.value), 1)
  const padding = { top: 8, right: 8, bottom: 24, left: 36 }
  const width = 520
  const chartWidth = width - padding.left - padding.right
  const chartHeight = height - padding.top - padding.bottom
  const stepX = data.length > 1 ? chartWidth / (data.length - 1) : 0
  const baseline = padding.top + chartHeight

  const points = data.map((d, i) => ({
    ...d,
    x: padding.left + i * stepX,
    y: baseline - (d.value / max) * chartHeight,
  }))

  const pathD = points
    .map((p, i) => `${i === 0 ? 'M' : 'L'} ${p.x} ${p.y}`)
    .join(' ')

  // Thin the x labels so they never overlap
  const labelEvery = Math.max(1, Math.ceil(data.length / 8))

  return (
    <svg
      width="100%"
      viewBox={`0 0 ${width} ${height}`}
      preserveAspectRatio="xMidYMid meet"
      style={{ maxWidth: width, height }}
      role="img"
      aria-label={`Line chart: ${valueLabel} over ${data.length} days`}
    >
      <defs>
        <linearGradient id={gradientId} x1="0" y1="0" x2="0" y2="1">
          <stop offset="0%" stopColor={accentColor} stopOpacity={0.3} />
          <stop offset="100%" stopColor={accentColor} stopOpacity={0} />
        </linearGradient>
      </defs>
      {[0, max].map((v) => (
        <text
          key={v}
          x={padding.left - 6}
          y={baseline - (v / max) * chartHeight + 4}
          textAnchor="end"
          fontSize="10"
          fill="var(--text-muted)"
        >
          {Math.round(v)}
        </text>
      ))}
      {/* Area fill under line */}
      <path
        d={`${pathD} L ${points[points.length - 1].x} ${baseline} L ${points[0].x} ${baseline} Z`}
        fill={`url(#${gradientId})`}
      />
      <path
        d={pathD}
        fill="none"
        stroke={accentColor}
        strokeWidth="2"
        strokeLinecap="round"
        strokeLinejoin="round"
      />
      {points.map((p) => {
        const isSelected = selectedDate === p.date
        return (
          <circle
            key={p.date}
            cx={p.x}
            cy={p.y}
            r={isSelected ? 6 : 4}
            fill="var(--bg)"
            stroke={isSelected ? 'var(--accent)' : 'var(--border)'}
            strokeWidth={isSelected ? 2.5 : 1.5}
            style={onSelectDate ? { cursor: 'pointer' } : undefined}
            onClick={() => onSelectDate?.(p.date)}
            aria-label={`${p.date}: ${p.value} ${valueLabel}`}
          />
        )
      })}
      {points.map((p, i) =>
        i % labelEvery === 0 ? (
          <text
            key={p.date}
            x={p.x}
            y={height - 6}
            textAnchor="middle"
            fontSize="10"
            fill="var(--text-muted)"
          >
            {shortDayLabel(p.date)}
          </text>
        ) : null
      )}
    </svg>
  )
}
