import { Toaster } from 'sonner';
import Home from './pages/Home';

function App() {
  return (
    <>
      <Toaster position="top-right" richColors />
      <Home />
    </>
  );
}

export default App;
