import { BrowserRouter, Route, Routes } from "react-router-dom";
import { Toaster } from "sonner";
import ExplorerPage from "./pages/Explorer";
import NotFound from "./pages/NotFound";

const App = () => (
  <>
    <Toaster richColors position="top-right" />
    <BrowserRouter>
      <Routes>
        <Route path="/" element={<ExplorerPage />} />
        <Route path="*" element={<NotFound />} />
      </Routes>
    </BrowserRouter>
  </>
);

export default App;
