// Dev: VITE_API_BASE_URL="http://127.0.0.1:8123", or unset to go through the Vite proxy.
// Served by the API itself: unset, so requests stay on the same origin.
function getApiBaseUrl(): string {
  const env = import.meta.env.VITE_API_BASE_URL;
  if (!env || env.trim() === "") {
    return window.location.origin;
  }
  return env.replace(/\/$/, "");
}

export const API_BASE_URL = getApiBaseUrl();
