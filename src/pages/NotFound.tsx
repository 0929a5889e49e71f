import { useNavigate } from "react-router-dom";
import { ArrowLeft } from "lucide-react";
import { SiteShell } from "@/components/SiteShell";
import { Button } from "@/components/ui/button";

const NotFound = () => {
  const navigate = useNavigate();
  return (
    <SiteShell>
      <main className="container mx-auto space-y-4 px-4 py-10">
        <h2 className="text-xl font-semibold">Page not found</h2>
        <Button variant="ghost" onClick={() => navigate("/")}>
          <ArrowLeft className="mr-2 h-4 w-4" />
          Back to dashboard
        </Button>
      </main>
    </SiteShell>
  );
};

export default NotFound;
