// Run the suite off UTC so host-local date parsing shows up in tests
export default function globalSetup(): void {
  process.env.TZ = 'America/New_York';
}
