import { useEffect, useState } from 'react'
import { Outlet, NavLink } from 'react-router-dom'
import { LOG_SHEET_NAME } from '../../../shared/dailyLog'
import { checkHealth } from '../api'

function useServerOnline(): boolean | null {
  const [online, setOnline] = useState<boolean | null>(null)
  useEffect(() => {
    let cancelled = false

    const refresh = async () => {
      const ok = await checkHealth()
      if (!cancelled) setOnline(ok)
    }

    void refresh()
    const interval = window.setInterval(refresh, 15_000)

    return () => {
      cancelled = true
      window.clearInterval(interval)
    }
  }, [])
  return online
}

export default function Layout() {
  const online = useServerOnline()
  return (
    <div style={styles.wrapper}>
      <header style={styles.header}>
        <NavLink to="/" style={styles.logo}>
          ☀️ Daily Activity Log
        </NavLink>
        <nav style={styles.nav}>
          <NavLink
            to="/"
            end
            style={({ isActive }) => ({ ...styles.navLink, ...(isActive ? styles.navLinkActive : {}) })}
          >
            Log today
          </NavLink>
          <NavLink
            to="/report"
            style={({ isActive }) => ({ ...styles.navLink, ...(isActive ? styles.navLinkActive : {}) })}
          >
            Report
          </NavLink>
          <span
            style={{ ...styles.status, color: online === false ? 'var(--danger)' : 'var(--text-muted)' }}
            title={online === false ? 'Log server unreachable' : 'Log server'}
          >
            {online === null ? '…' : online ? '● Online' : '● Offline'}
          </span>
        </nav>
      </header>
      <main style={styles.main}>
        <StorageNote />
        <Outlet />
      </main>
    </div>
  )
}

function StorageNote() {
  return (
    <aside style={styles.note} role="note">
      Entries are appended to the <strong>{LOG_SHEET_NAME}</strong> Google Sheet. Nothing is edited or
      deleted once saved; fix mistakes directly in the sheet.
    </aside>
  )
}

const styles: Record<string, React.CSSProperties> = {
  wrapper: {
    minHeight: '100vh',
    display: 'flex',
    flexDirection: 'column',
  },
  header: {
    background: 'var(--surface)',
    borderBottom: '1px solid var(--border)',
    padding: '1rem 1.5rem',
    display: 'flex',
    alignItems: 'center',
    justifyContent: 'space-between',
    flexWrap: 'wrap',
    gap: '1rem',
  },
  logo: {
    fontSize: '1.25rem',
    fontWeight: 600,
    color: 'var(--text)',
    textDecoration: 'none',
  },
  nav: {
    display: 'flex',
    gap: '1.5rem',
  },
  navLink: {
    color: 'var(--text-muted)',
    textDecoration: 'none',
    fontWeight: 500,
  },
  navLinkActive: {
    color: 'var(--accent)',
  },
  status: {
    fontSize: '0.8125rem',
    fontFamily: 'var(--font-mono)',
  },
  main: {
    flex: 1,
    padding: '1.5rem',
    maxWidth: 960,
    margin: '0 auto',
    width: '100%',
  },
  note: {
    background: 'var(--surface-elevated)',
    border: '1px solid var(--border)',
    borderRadius: 'var(--radius)',
    padding: '0.75rem 1rem',
    marginBottom: '1.5rem',
    fontSize: '0.875rem',
    color: 'var(--text-muted)',
  },
}
