import { useState, type FormEvent } from 'react'
import { useLog } from '../context/LogContext'
import {
  ACTIVITY_TYPES,
  EMPTY_EXERCISE,
  EXERCISE_TYPES,
  MAX_ACTIVITY_SLOTS,
  RATING_MAX,
  RATING_MIN,
  SENTINEL_TYPE,
  type ActivityType,
  type DailyLogForm,
  type ExerciseEntry,
  type ExerciseType,
} from '../../../shared/dailyLog'

const RATING_LABELS: Record<number, string> = {
  1: 'Very low',
  2: 'Low',
  3: 'Okay',
  4: 'Good',
  5: 'Great',
}

function todayIso(): string {
  return new Date().toLocaleDateString('en-CA')
}

function asExerciseType(value: string): ExerciseType | undefined {
  return EXERCISE_TYPES.find((t) => t === value)
}

function asActivityType(value: string): ActivityType | undefined {
  return ACTIVITY_TYPES.find((t) => t === value)
}

function nonNegative(raw: string, integer = false): number {
  const n = integer ? parseInt(raw, 10) : parseFloat(raw)
  return Number.isFinite(n) && n > 0 ? n : 0
}

function emptyForm(): DailyLogForm {
  return {
    date: todayIso(),
    satisfaction: 3,
    neuralgia: 1,
    exercise1: { ...EMPTY_EXERCISE },
    exercise2: { ...EMPTY_EXERCISE },
    insights: '',
  }
}

export default function LogPage() {
  const log = useLog()
  const [form, setForm] = useState<DailyLogForm>(emptyForm)
  const [activityType, setActivityType] = useState<ActivityType>('Walk')
  const [activityMinutes, setActivityMinutes] = useState('15')
  const [activityNotes, setActivityNotes] = useState('')

  const patch = (p: Partial<DailyLogForm>) => {
    log.dismissSaved()
    setForm((prev) => ({ ...prev, ...p }))
  }

  const handleAddActivity = async () => {
    const added = await log.addActivity({
      type: activityType,
      minutes: nonNegative(activityMinutes, true),
      notes: activityNotes.trim(),
    })
    if (added) setActivityNotes('')
  }

  const handleSubmit = async (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault()
    const saved = await log.submitEntry({ ...form, insights: form.insights.trim() })
    if (saved) setForm(emptyForm())
  }

  const listFull = log.staged.length >= MAX_ACTIVITY_SLOTS

  return (
    <div style={styles.page}>
      <h1 style={styles.title}>Daily Activity Log</h1>
      <p style={styles.subtitle}>Record your health metrics and exercise for today.</p>

      <form onSubmit={handleSubmit} style={styles.page} aria-label="Daily log entry">
        <section style={styles.section}>
          <h2 style={styles.sectionTitle}>How was the day?</h2>
          <div style={styles.formGrid}>
            <label style={styles.label}>
              Date
              <input
                type="date"
                required
                value={form.date}
                onChange={(e) => patch({ date: e.target.value })}
                style={styles.input}
              />
            </label>
            <RatingSlider
              label="Satisfaction rating"
              value={form.satisfaction}
              onChange={(satisfaction) => patch({ satisfaction })}
            />
            <RatingSlider
              label="Neuralgia / pain rating"
              value={form.neuralgia}
              onChange={(neuralgia) => patch({ neuralgia })}
            />
          </div>
        </section>

        <section style={styles.section}>
          <h2 style={styles.sectionTitle}>Exercise</h2>
          <div style={styles.exerciseGrid}>
            <ExerciseFields
              title="Exercise 1"
              value={form.exercise1}
              onChange={(exercise1) => patch({ exercise1 })}
            />
            <ExerciseFields
              title="Exercise 2"
              value={form.exercise2}
              onChange={(exercise2) => patch({ exercise2 })}
            />
          </div>
        </section>

        <section style={styles.section}>
          <h2 style={styles.sectionTitle}>Daily activities</h2>
          <p style={styles.sectionHint}>
            Add activities one at a time. Up to {MAX_ACTIVITY_SLOTS} are saved with the entry, and the list
            empties once the entry is saved.
          </p>
          <div style={styles.activityRow}>
            <label style={styles.label}>
              Activity
              <select
                value={activityType}
                onChange={(e) => {
                  const type = asActivityType(e.target.value)
                  if (type) setActivityType(type)
                }}
                style={styles.input}
              >
                {ACTIVITY_TYPES.filter((t) => t !== SENTINEL_TYPE).map((t) => (
                  <option key={t} value={t}>
                    {t}
                  </option>
                ))}
              </select>
            </label>
            <label style={styles.label}>
              Minutes
              <input
                type="number"
                min={0}
                step={5}
                value={activityMinutes}
                onChange={(e) => setActivityMinutes(e.target.value)}
                style={styles.input}
              />
            </label>
            <label style={{ ...styles.label, flex: '1 1 220px' }}>
              Notes
              <input
                type="text"
                value={activityNotes}
                onChange={(e) => setActivityNotes(e.target.value)}
                placeholder="e.g. Walked to the market"
                style={styles.input}
              />
            </label>
          </div>
          <div style={styles.buttonRow}>
            <button
              type="button"
              onClick={handleAddActivity}
              disabled={log.stagingBusy || listFull}
              style={styles.secondaryBtn}
            >
              Add activity
            </button>
            <button
              type="button"
              onClick={log.clearActivities}
              disabled={log.stagingBusy || log.staged.length === 0}
              style={styles.secondaryBtn}
            >
              Clear List
            </button>
          </div>
          {log.stagingError && <p style={styles.errorMsg}>{log.stagingError}</p>}
          {log.staged.length > 0 ? (
            <ol style={styles.stagedList} aria-label="Pending activities">
              {log.staged.map((a, i) => (
                <li key={i} style={styles.stagedItem}>
                  <strong>{a.type}</strong> · {a.minutes} min
                  {a.notes && <span style={styles.stagedNotes}> “{a.notes}”</span>}
                </li>
              ))}
            </ol>
          ) : (
            <p style={styles.emptyHint}>No activities added yet.</p>
          )}
        </section>

        <section style={styles.section}>
          <label style={styles.labelBlock}>
            Daily insights &amp; health notes
            <textarea
              value={form.insights}
              onChange={(e) => patch({ insights: e.target.value })}
              rows={4}
              style={styles.textarea}
            />
          </label>
          <button type="submit" disabled={log.submitting} style={styles.saveBtn}>
            {log.submitting ? 'Saving...' : 'Save to Google Sheet'}
          </button>
          {log.savedDate && (
            <p style={styles.successMsg} role="status">
              Successfully saved entry for {log.savedDate}!
            </p>
          )}
          {log.submitError && (
            <p style={styles.errorMsg} role="alert">
              {log.submitError}
            </p>
          )}
        </section>
      </form>
    </div>
  )
}

// Sub-components

function RatingSlider({
  label,
  value,
  onChange,
}: {
  label: string
  value: number
  onChange: (value: number) => void
}) {
  return (
    <label style={styles.label}>
      {label} ({RATING_MIN}-{RATING_MAX})
      <input
        type="range"
        min={RATING_MIN}
        max={RATING_MAX}
        step={1}
        value={value}
        onChange={(e) => onChange(Number(e.target.value))}
      />
      <span style={styles.ratingValue}>
        {value} · {RATING_LABELS[value]}
      </span>
    </label>
  )
}

function ExerciseFields({
  title,
  value,
  onChange,
}: {
  title: string
  value: ExerciseEntry
  onChange: (value: ExerciseEntry) => void
}) {
  return (
    <fieldset style={styles.fieldset}>
      <legend style={styles.legend}>{title}</legend>
      <label style={styles.label}>
        Type
        <select
          value={value.type}
          onChange={(e) => {
            const type = asExerciseType(e.target.value)
            if (type) onChange({ ...value, type })
          }}
          style={styles.input}
        >
          {EXERCISE_TYPES.map((t) => (
            <option key={t} value={t}>
              {t}
            </option>
          ))}
        </select>
      </label>
      <label style={styles.label}>
        Minutes
        <input
          type="number"
          min={0}
          step={5}
          value={value.minutes}
          onChange={(e) => onChange({ ...value, minutes: nonNegative(e.target.value) })}
          style={styles.input}
        />
      </label>
      <label style={styles.label}>
        Miles
        <input
          type="number"
          min={0}
          step={0.1}
          value={value.miles}
          onChange={(e) => onChange({ ...value, miles: nonNegative(e.target.value) })}
          style={styles.input}
        />
      </label>
    </fieldset>
  )
}

const styles: Record<string, React.CSSProperties> = {
  page: { display: 'flex', flexDirection: 'column', gap: '1.5rem' },
  title: { margin: 0, fontSize: '1.75rem', fontWeight: 700 },
  subtitle: { margin: 0, color: 'var(--text-muted)', fontSize: '1rem' },
  section: {
    background: 'var(--surface)',
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    padding: '1.5rem',
  },
  sectionTitle: { margin: '0 0 1rem', fontSize: '1.125rem', fontWeight: 600 },
  sectionHint: { margin: '-0.5rem 0 1rem', fontSize: '0.875rem', color: 'var(--text-muted)' },
  formGrid: {
    display: 'grid',
    gridTemplateColumns: 'repeat(auto-fill, minmax(180px, 1fr))',
    gap: '1rem',
  },
  exerciseGrid: {
    display: 'grid',
    gridTemplateColumns: 'repeat(auto-fill, minmax(240px, 1fr))',
    gap: '1rem',
  },
  fieldset: {
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    padding: '0.75rem 1rem 1rem',
    display: 'flex',
    flexDirection: 'column',
    gap: '0.75rem',
    margin: 0,
  },
  legend: { padding: '0 0.35rem', fontWeight: 600, fontSize: '0.9375rem' },
  label: {
    display: 'flex',
    flexDirection: 'column',
    gap: '0.35rem',
    fontSize: '0.875rem',
    fontWeight: 500,
    color: 'var(--text-muted)',
  },
  labelBlock: {
    display: 'flex',
    flexDirection: 'column',
    gap: '0.35rem',
    fontSize: '0.875rem',
    fontWeight: 500,
    color: 'var(--text-muted)',
    marginBottom: '1rem',
  },
  input: {
    padding: '0.5rem 0.75rem',
    background: 'var(--bg)',
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    color: 'var(--text)',
    fontFamily: 'inherit',
    fontSize: '1rem',
  },
  textarea: {
    padding: '0.5rem 0.75rem',
    background: 'var(--bg)',
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    color: 'var(--text)',
    fontFamily: 'inherit',
    fontSize: '1rem',
    resize: 'vertical',
    minHeight: 80,
  },
  ratingValue: { fontSize: '0.8125rem', color: 'var(--accent)', fontFamily: 'var(--font-mono)' },
  activityRow: { display: 'flex', gap: '0.75rem', flexWrap: 'wrap', alignItems: 'flex-end' },
  buttonRow: { display: 'flex', gap: '0.75rem', marginTop: '0.75rem' },
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
  stagedList: { margin: '1rem 0 0', paddingLeft: '1.25rem', fontSize: '0.875rem' },
  stagedItem: { marginBottom: '0.35rem' },
  stagedNotes: { color: 'var(--text-muted)', fontStyle: 'italic' },
  emptyHint: { margin: '1rem 0 0', fontSize: '0.875rem', color: 'var(--text-muted)' },
  saveBtn: {
    alignSelf: 'flex-start',
    padding: '0.75rem 1.25rem',
    background: 'var(--accent)',
    color: 'var(--bg)',
    border: 'none',
    borderRadius: 'var(--radius)',
    fontWeight: 600,
    fontSize: '1rem',
    cursor: 'pointer',
  },
  errorMsg: { margin: '0.75rem 0 0', color: 'var(--danger)', fontSize: '0.875rem', fontWeight: 600 },
  successMsg: { margin: '0.75rem 0 0', color: 'var(--accent)', fontSize: '0.875rem', fontWeight: 500 },
}
