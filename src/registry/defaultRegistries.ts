import { ActionResolver } from '../actions/actionResolver'
import { resolveButton, resolveLabel, resolveTextField } from '../resolution/components/textResolvers'
import { resolvePageIndicator, resolveSlider, resolveToggle } from '../resolution/components/controlResolvers'
import { resolveCustomComponent } from '../resolution/components/customComponentResolver'
import { resolveDivider, resolveGradient, resolveImage, resolveShapeComponent } from '../resolution/components/mediaResolvers'
import { resolveContainer } from '../resolution/layouts/containerResolver'
import { resolveForEach } from '../resolution/layouts/forEachResolver'
import { defaultSectionConfigResolvers } from '../resolution/layouts/sectionConfigResolvers'
import { resolveSectionLayout } from '../resolution/layouts/sectionLayoutResolver'
import { resolveSpacer } from '../resolution/layouts/spacerResolver'
import { mergeRegistries, type ComponentRegistry, type LayoutRegistry, type RegistryOverrides, type ResolverRegistries } from './registry'

export function defaultComponentRegistry(): ComponentRegistry {
  return {
    label: resolveLabel,
    text: resolveLabel,
    button: resolveButton,
    textfield: resolveTextField,
    toggle: resolveToggle,
    slider: resolveSlider,
    image: resolveImage,
    gradient: resolveGradient,
    shape: resolveShapeComponent,
    divider: resolveDivider,
    pageIndicator: resolvePageIndicator,
  }
}

// Host component types that pass through as `custom` nodes.
export function customComponentRegistry(types: Iterable<string>): ComponentRegistry {
  const registry: ComponentRegistry = {}
  for (const type of types) registry[type] = resolveCustomComponent
  return registry
}

export function defaultLayoutRegistry(): LayoutRegistry {
  return {
    layout: resolveContainer,
    forEach: resolveForEach,
    sectionLayout: resolveSectionLayout,
    spacer: resolveSpacer,
  }
}

// Fresh registries per call; nothing is shared between runtimes.
export function createDefaultRegistries(overrides: RegistryOverrides = {}): ResolverRegistries {
  return mergeRegistries(
    {
      components: defaultComponentRegistry(),
      layouts: defaultLayoutRegistry(),
      sections: defaultSectionConfigResolvers(),
      actions: new ActionResolver(),
    },
    overrides,
  )
}
