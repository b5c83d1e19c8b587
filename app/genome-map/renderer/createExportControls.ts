import type { ExportFormat } from './exportScene'

export interface ExportControls {
  dispose(): void
}

const BUTTONS: ReadonlyArray<{ format: ExportFormat; label: string; right: string }> = [
  { format: 'svg', label: 'Download SVG', right: '150px' },
  { format: 'png', label: 'Download PNG', right: '20px' },
]

export function createExportControls(
  container: HTMLElement,
  onExport: (format: ExportFormat) => void,
): ExportControls {
  let disposed = false

  const entries = BUTTONS.map(({ format, label, right }) => {
    const el = document.createElement('button')
    el.type = 'button'
    el.setAttribute('data-genome-map-export', format)
    el.textContent = label
    el.style.position = 'absolute'
    el.style.top = '10px'
    el.style.right = right

    const onClick = () => {
      if (disposed) return
      onExport(format)
    }
    el.addEventListener('click', onClick)
    container.appendChild(el)
    return { el, onClick }
  })

  return {
    dispose() {
      if (disposed) return
      disposed = true
      for (const { el, onClick } of entries) {
        el.removeEventListener('click', onClick)
        el.remove()
      }
    },
  }
}
