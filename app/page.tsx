import Link from 'next/link'

export default function HomePage() {
  return (
    <div className="container mx-auto space-y-4 px-6 py-10">
      <h1 className="text-2xl font-semibold">Genome maps</h1>
      <p className="text-sm text-neutral-600">
        Open the live map to receive annotations from the dashboard, or load a saved map by id.
      </p>
      <Link href="/genome-map" className="text-sky-700 underline">
        Live genome map
      </Link>
    </div>
  )
}
