import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { BrowserRouter } from 'react-router-dom'
import { LogProvider } from './context/LogContext'
import { ErrorBoundary } from './components/ErrorBoundary'
import App from './App'
import './index.css'

const baseName = import.meta.env.BASE_URL.replace(/\/$/, '')

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element')

createRoot(container).render(
  <StrictMode>
    <ErrorBoundary>
      <BrowserRouter basename={baseName}>
        <LogProvider>
          <App />
        </LogProvider>
      </BrowserRouter>
    </ErrorBoundary>
  </StrictMode>,
)
