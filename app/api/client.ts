import axios from 'axios'

// purpose: shared HTTP client for dashboard endpoints
// status: active

const api = axios.create({
  baseURL: process.env.NEXT_PUBLIC_API_URL ?? '',
  timeout: 30_000,
})

export default api
