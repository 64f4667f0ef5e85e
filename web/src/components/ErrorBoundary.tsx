import { Component, type ErrorInfo, type ReactNode } from 'react'

interface Props {
  children: ReactNode
  fallback?: ReactNode
}

interface State {
  error: Error | null
}

export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null }

  static getDerivedStateFromError(error: Error): State {
    return { error }
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('[daily-log] render error:', error, info.componentStack)
  }

  render() {
    const { error } = this.state
    if (!error) return this.props.children
    if (this.props.fallback) return this.props.fallback

    return (
      <div style={styles.box} role="alert">
        <h2 style={styles.title}>This view could not be displayed</h2>
        <p style={styles.message}>{error.message}</p>
        <p style={styles.hint}>Saved entries are safe in the sheet. Try again, or reload the page.</p>
        <button type="button" onClick={() => this.setState({ error: null })} style={styles.retry}>
          Try again
        </button>
      </div>
    )
  }
}

const styles: Record<string, React.CSSProperties> = {
  box: { padding: '2rem', maxWidth: 560, margin: '0 auto', fontFamily: 'var(--font-sans)' },
  title: { color: 'var(--danger)', marginTop: 0 },
  message: { color: 'var(--text)', fontFamily: 'var(--font-mono)', fontSize: '0.875rem' },
  hint: { color: 'var(--text-muted)', fontSize: '0.875rem' },
  retry: {
    marginTop: '1rem',
    padding: '0.5rem 1rem',
    background: 'var(--accent)',
    border: 'none',
    borderRadius: 8,
    cursor: 'pointer',
  },
}
