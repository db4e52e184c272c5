import { ExchangePage } from '@/pages/ExchangePage'

function App() {
  return <ExchangePage />
}

export default App
