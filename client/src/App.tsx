import { Switch, Route } from "wouter";
import { QueryClientProvider } from "@tanstack/react-query";
import { Stethoscope } from "lucide-react";
import { queryClient } from "./lib/queryClient";
import TabNavigation, { type TabItem } from "@/components/TabNavigation";
import ChatResearch from "@/pages/ChatResearch";
import CodeResearch from "@/pages/CodeResearch";
import Feedback from "@/pages/Feedback";

const tabs: TabItem[] = [
  { id: "chat", label: "Chat Research", path: "/" },
  { id: "codes", label: "Code Research", path: "/research" },
  { id: "feedback", label: "Feedback", path: "/feedback" },
];

function Router() {
  return (
    <Switch>
      <Route path="/" component={ChatResearch} />
      <Route path="/research" component={CodeResearch} />
      <Route path="/feedback" component={Feedback} />
      <Route>
        <div className="p-12 text-center text-muted-foreground">Page not found</div>
      </Route>
    </Switch>
  );
}

function App() {
  return (
    <QueryClientProvider client={queryClient}>
      <div className="min-h-screen bg-background">
        <header className="border-b border-border bg-background/95 sticky top-0 z-50">
          <div className="container mx-auto px-6 h-16 flex items-center justify-between">
            <div className="flex items-center gap-3">
              <Stethoscope className="h-6 w-6 text-primary" />
              <h1 className="font-semibold text-lg">APC Code Research</h1>
            </div>
            <TabNavigation tabs={tabs} />
          </div>
        </header>

        <main className="pb-12">
          <Router />
        </main>
      </div>
    </QueryClientProvider>
  );
}

export default App;
