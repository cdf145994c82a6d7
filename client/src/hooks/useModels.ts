import { useQuery } from "@tanstack/react-query";

export interface ModelOption {
  id: string;
  label: string;
}

export interface ModelCatalog {
  research: ModelOption[];
  chat: ModelOption[];
  defaults: {
    CODE_DISCOVERY: string;
    RESEARCH_ANALYSIS: string;
    SECTION_CHAT: string;
    CHAT_RESEARCH: string;
  };
}

export function useModels() {
  return useQuery<ModelCatalog>({
    queryKey: ["/api/models"],
    staleTime: Infinity,
  });
}
