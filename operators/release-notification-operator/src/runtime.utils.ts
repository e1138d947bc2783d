import type { ChartDependency } from './release-notification.interfaces'
import type { ServiceVersion }  from './release-notification.interfaces'

export interface ParsedImage {
  image: string
  tag: string
}

export const parseImage = (reference: string): ParsedImage => {
  const [repositoryWithTag, digest] = reference.split('@')
  const tagSeparator = repositoryWithTag.lastIndexOf(':')

  if (tagSeparator > repositoryWithTag.lastIndexOf('/')) {
    return {
      image: repositoryWithTag.slice(0, tagSeparator),
      tag: repositoryWithTag.slice(tagSeparator + 1) || 'latest',
    }
  }

  return {
    image: repositoryWithTag,
    tag: digest || 'latest',
  }
}

export const toServiceVersion = (reference: string): ServiceVersion => {
  const { image, tag } = parseImage(reference)

  return {
    name: image.slice(image.lastIndexOf('/') + 1),
    image,
    tag,
  }
}

export const parseChartLabel = (label: string): ChartDependency | null => {
  const separator = label.lastIndexOf('-')

  if (separator <= 0 || separator === label.length - 1) {
    return null
  }

  return {
    name: label.slice(0, separator),
    version: label.slice(separator + 1),
  }
}
