import { QueryClient } from '@tanstack/react-query'

export const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      gcTime: 5 * 60 * 1000, // 5 minutes - garbage collection time
      retry: 0, // Rate loading has its own retry and cache fallback
      refetchOnWindowFocus: false, // Don't refetch on window focus
    },
    mutations: {
      retry: 0, // Don't retry failed mutations
    },
  },
})
