import { Routes, Route, Navigate } from 'react-router-dom'
import Layout from './components/Layout'
import LogPage from './pages/LogPage'
import ReportPage from './pages/ReportPage'

function App() {
  return (
    <Routes>
      <Route element={<Layout />}>
        <Route path="/" element={<LogPage />} />
        <Route path="/report" element={<ReportPage />} />
        <Route path="*" element={<Navigate to="/" replace />} />
      </Route>
    </Routes>
  )
}

export default App
